import { afterAll, afterEach, beforeAll, describe, it, expect, vi } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { main } from './main.js'

const env = { LOG_LEVEL: 'silent', LOG_PRETTY: '0', PLAYER_FPS: '10' }

let dir: string
let chartPath: string

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), 'beatscroll-main-'))
  chartPath = join(dir, 'chart.json')
  await writeFile(chartPath, JSON.stringify({
    bPM: 120,
    lines: [{ notes: [{ type: 0, time: 2 }] }],
  }))
})

afterAll(async () => {
  await rm(dir, { recursive: true, force: true })
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('main', () => {
  it('plays a chart and exits cleanly', async () => {
    expect(await main([chartPath], env)).toBe(0)
  })

  it('prints usage without a chart path', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})

    expect(await main([], env)).toBe(1)
    expect(error).toHaveBeenCalledWith('usage: beatscroll-player <chart.json>')
  })

  it('fails on a bad configuration', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})

    expect(await main([chartPath], { ...env, PLAYER_END_BEHAVIOR: 'never' })).toBe(1)
    expect(error).toHaveBeenCalledWith('PLAYER_END_BEHAVIOR must be stop, loop or hold (got never)')
  })

  it('fails when the chart cannot be loaded', async () => {
    expect(await main([join(dir, 'missing.json')], env)).toBe(1)
  })
})
