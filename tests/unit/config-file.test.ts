import { vi, describe, it, expect, beforeEach } from 'vitest'
import { vol } from 'memfs'

vi.mock('node:fs', async () => {
  const m = await vi.importActual<typeof import('memfs')>('memfs')
  return { default: m.fs, ...m.fs }
})
vi.mock('node:fs/promises', async () => {
  const m = await vi.importActual<typeof import('memfs')>('memfs')
  return { default: m.fs.promises, ...m.fs.promises }
})

import { ConfigFileError, loadConfigFile, mergeConfigLayers } from '../../src/config-file.js'

describe('loadConfigFile', () => {
  beforeEach(() => {
    vol.reset()
  })

  it('parses a YAML mapping', async () => {
    vol.fromJSON({
      '/etc/dpm.yaml': [
        'selection:',
        '  minDpm: 2.5',
        '  topN: 10',
        'filter:',
        '  excludePrefixes: [grafana_, prometheus_]',
      ].join('\n'),
    })

    await expect(loadConfigFile('/etc/dpm.yaml')).resolves.toEqual({
      selection: { minDpm: 2.5, topN: 10 },
      filter: { excludePrefixes: ['grafana_', 'prometheus_'] },
    })
  })

  it('returns an empty object for an empty file', async () => {
    vol.fromJSON({ '/etc/dpm.yaml': '' })
    await expect(loadConfigFile('/etc/dpm.yaml')).resolves.toEqual({})
  })

  it('fails for a missing file', async () => {
    await expect(loadConfigFile('/etc/missing.yaml')).rejects.toThrow('config file not found: /etc/missing.yaml')
  })

  it('fails for invalid YAML', async () => {
    vol.fromJSON({ '/etc/dpm.yaml': 'selection: [unclosed' })
    await expect(loadConfigFile('/etc/dpm.yaml')).rejects.toBeInstanceOf(ConfigFileError)
  })

  it('fails when the root is not a mapping', async () => {
    vol.fromJSON({ '/etc/dpm.yaml': '- a\n- b\n' })
    await expect(loadConfigFile('/etc/dpm.yaml')).rejects.toThrow(
      'config file /etc/dpm.yaml must contain a mapping, got array',
    )
  })
})

describe('mergeConfigLayers', () => {
  it('merges nested mappings with later layers winning', () => {
    expect(
      mergeConfigLayers(
        { selection: { minDpm: 2, topN: 5 }, dispatch: { threads: 4 } },
        { selection: { minDpm: 8 } },
      ),
    ).toEqual({ selection: { minDpm: 8, topN: 5 }, dispatch: { threads: 4 } })
  })

  it('ignores undefined values', () => {
    expect(mergeConfigLayers({ dispatch: { threads: 4 } }, { dispatch: { threads: undefined } })).toEqual({
      dispatch: { threads: 4 },
    })
  })

  it('replaces arrays instead of merging them', () => {
    expect(
      mergeConfigLayers({ filter: { excludeSuffixes: ['_a', '_b'] } }, { filter: { excludeSuffixes: ['_c'] } }),
    ).toEqual({ filter: { excludeSuffixes: ['_c'] } })
  })
})
