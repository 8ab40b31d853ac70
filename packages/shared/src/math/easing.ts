/**
 * Easing functions.
 * Each takes a progress value t in [0, 1] and returns the eased progress.
 * Overshooting curves (back, elastic) may leave [0, 1] between the endpoints.
 */

export type EasingFunction = (t: number) => number

export const linear = (t: number): number => t

export const quadIn = (t: number): number => t * t
export const quadOut = (t: number): number => 1 - (1 - t) * (1 - t)
export const quadInOut = (t: number): number =>
  t < 0.5 ? 2 * t * t : 1 - Math.pow(-2 * t + 2, 2) / 2

export const cubicIn = (t: number): number => Math.pow(t, 3)
export const cubicOut = (t: number): number => 1 - Math.pow(1 - t, 3)
export const cubicInOut = (t: number): number =>
  t < 0.5 ? 4 * Math.pow(t, 3) : 1 - Math.pow(-2 * t + 2, 3) / 2

export const quartIn = (t: number): number => Math.pow(t, 4)
export const quartOut = (t: number): number => 1 - Math.pow(1 - t, 4)
export const quartInOut = (t: number): number =>
  t < 0.5 ? 8 * Math.pow(t, 4) : 1 - Math.pow(-2 * t + 2, 4) / 2

export const quintIn = (t: number): number => Math.pow(t, 5)
export const quintOut = (t: number): number => 1 - Math.pow(1 - t, 5)
export const quintInOut = (t: number): number =>
  t < 0.5 ? 16 * Math.pow(t, 5) : 1 - Math.pow(-2 * t + 2, 5) / 2

export const sineIn = (t: number): number => 1 - Math.cos(Math.PI * t / 2)
export const sineOut = (t: number): number => Math.sin(Math.PI * t / 2)
export const sineInOut = (t: number): number => -(Math.cos(Math.PI * t) - 1) / 2

export const circIn = (t: number): number => 1 - Math.pow(1 - t * t, 0.5)
export const circOut = (t: number): number => Math.pow(1 - (t - 1) * (t - 1), 0.5)
export const circInOut = (t: number): number => {
  if (t < 0.5) return (1 - Math.pow(1 - Math.pow(2 * t, 2), 0.5)) / 2
  return (Math.pow(1 - Math.pow(-2 * t + 2, 2), 0.5) + 1) / 2
}

export const expoIn = (t: number): number =>
  t === 0 ? 0 : Math.pow(2, 10 * t - 10)
export const expoOut = (t: number): number =>
  t === 1 ? 1 : 1 - Math.pow(2, -10 * t)
export const expoInOut = (t: number): number => {
  if (t === 0) return 0
  if (t === 1) return 1
  return t < 0.5
    ? Math.pow(2, 20 * t - 10) / 2
    : (2 - Math.pow(2, -20 * t + 10)) / 2
}

export const backIn = (t: number): number =>
  2.70158 * Math.pow(t, 3) - 1.70158 * Math.pow(t, 2)
export const backOut = (t: number): number => {
  const x = t - 1
  return 1 + 2.70158 * Math.pow(x, 3) + 1.70158 * Math.pow(x, 2)
}
export const backInOut = (t: number): number => {
  const s = 2.5949095
  if (t < 0.5) {
    const x = 2 * t
    return (x * x * ((s + 1) * x - s)) / 2
  }
  const x = 2 * t - 2
  return (x * x * ((s + 1) * x + s) + 2) / 2
}

export const elasticIn = (t: number): number => {
  if (t === 0) return 0
  if (t === 1) return 1
  return -Math.pow(2, 10 * t - 10) * Math.sin((t * 10 - 10.75) * (2 * Math.PI / 3))
}
export const elasticOut = (t: number): number => {
  if (t === 0) return 0
  if (t === 1) return 1
  return Math.pow(2, -10 * t) * Math.sin((t * 10 - 0.75) * (2 * Math.PI / 3)) + 1
}
export const elasticInOut = (t: number): number => {
  if (t === 0) return 0
  if (t === 1) return 1
  const k = (2 * Math.PI) / 4.5
  if (t < 0.5) return -(Math.pow(2, 20 * t - 10) * Math.sin((20 * t - 11.125) * k)) / 2
  return (Math.pow(2, -20 * t + 10) * Math.sin((20 * t - 11.125) * k)) / 2 + 1
}

export const bounceOut = (t: number): number => {
  if (t < 1 / 2.75) return 7.5625 * t * t
  if (t < 2 / 2.75) {
    const x = t - 1.5 / 2.75
    return 7.5625 * x * x + 0.75
  }
  if (t < 2.5 / 2.75) {
    const x = t - 2.25 / 2.75
    return 7.5625 * x * x + 0.9375
  }
  const x = t - 2.625 / 2.75
  return 7.5625 * x * x + 0.984375
}
export const bounceIn = (t: number): number => 1 - bounceOut(1 - t)
export const bounceInOut = (t: number): number =>
  t < 0.5
    ? (1 - bounceOut(1 - 2 * t)) / 2
    : (1 + bounceOut(2 * t - 1)) / 2

/**
 * Named easing table. The first nineteen entries are the core set; the
 * exponential, back, elastic and bounce families follow.
 */
export const EASINGS = {
  linear,
  quadIn,
  quadOut,
  quadInOut,
  cubicIn,
  cubicOut,
  cubicInOut,
  quartIn,
  quartOut,
  quartInOut,
  quintIn,
  quintOut,
  quintInOut,
  sineIn,
  sineOut,
  sineInOut,
  circIn,
  circOut,
  circInOut,
  expoIn,
  expoOut,
  expoInOut,
  backIn,
  backOut,
  backInOut,
  elasticIn,
  elasticOut,
  elasticInOut,
  bounceIn,
  bounceOut,
  bounceInOut,
} satisfies Record<string, EasingFunction>

export type EasingKind = keyof typeof EASINGS

export const EASING_KINDS: readonly EasingKind[] = Object.freeze(
  Object.keys(EASINGS).filter(isEasingKind)
)

export function isEasingKind(name: unknown): name is EasingKind {
  return typeof name === 'string' && Object.prototype.hasOwnProperty.call(EASINGS, name)
}

/**
 * Apply an easing curve. Endpoints are pinned to exactly 0 and 1 so that
 * curves whose closed form drifts by an ulp still meet them.
 * Callers clamp t; values outside [0, 1] are evaluated as-is.
 */
export function ease(kind: EasingKind, t: number): number {
  if (t === 0) return 0
  if (t === 1) return 1
  return EASINGS[kind](t)
}

/** Keyframe curve that keeps the start value until the next keyframe. */
export const holdStart = (_t: number): number => 0

/** Keyframe curve that jumps straight to the end value. */
export const jumpEnd = (_t: number): number => 1

const LEGACY_EASING_IDS: readonly EasingFunction[] = [
  linear,
  quadIn,
  quadOut,
  quadInOut,
  cubicIn,
  cubicOut,
  cubicInOut,
  quartIn,
  quartOut,
  quartInOut,
  quintIn,
  quintOut,
  quintInOut,
  holdStart,
  jumpEnd,
  circIn,
  circOut,
  sineOut,
  sineIn,
]

/**
 * Map a numeric easeType from legacy chart keyframes to its curve.
 * Unknown ids fall back to linear.
 */
export function easingFromType(tp: number): EasingFunction {
  return LEGACY_EASING_IDS[tp] ?? linear
}

/**
 * Cubic Bezier curve evaluation
 * Solves for y given x using binary search
 * Control points: (0,0), (x1,y1), (x2,y2), (1,1)
 */
export function cubicBezierYForX(
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  x: number,
  iters = 18
): number {
  const bx = (u: number): number => {
    const a = 1 - u
    return 3 * a * a * u * x1 + 3 * a * u * u * x2 + u * u * u
  }

  const by = (u: number): number => {
    const a = 1 - u
    return 3 * a * a * u * y1 + 3 * a * u * u * y2 + u * u * u
  }

  let lo = 0.0
  let hi = 1.0

  for (let i = 0; i < iters; i++) {
    const mid = (lo + hi) * 0.5
    if (bx(mid) < x) {
      lo = mid
    } else {
      hi = mid
    }
  }

  return by((lo + hi) * 0.5)
}
