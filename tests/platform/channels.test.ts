import fs from 'fs'
import os from 'os'
import path from 'path'
import { createChannelDirectory, loadChannelDirectory, parseChannelEntries } from '../../src/platform/channels'

describe('createChannelDirectory', () => {
  it('looks up credentials case-insensitively', () => {
    const channels = createChannelDirectory({ ShopA: 'cookie-a', ' ShopB ': 'cookie-b' })
    expect(channels.size()).toBe(2)
    expect(channels.credentialFor('shopa')).toBe('cookie-a')
    expect(channels.credentialFor('SHOPB')).toBe('cookie-b')
    expect(channels.credentialFor('ShopC')).toBeUndefined()
    expect(channels.credentialFor('')).toBeUndefined()
  })

  it('ignores empty credentials', () => {
    expect(createChannelDirectory({ ShopA: '' }).size()).toBe(0)
  })
})

describe('parseChannelEntries', () => {
  it('accepts plain cookies and cookie objects', () => {
    expect(parseChannelEntries({
      A: ' cookie-a ',
      B: { cookie: 'cookie-b', note: 'main shop' },
      C: { other: 1 },
      D: 5,
    })).toEqual({ A: 'cookie-a', B: 'cookie-b' })
  })

  it('returns nothing for a non-object document', () => {
    expect(parseChannelEntries(['A'])).toEqual({})
    expect(parseChannelEntries(null)).toEqual({})
  })
})

describe('loadChannelDirectory', () => {
  let dir: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'channels-'))
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('loads channels from a JSON file', async () => {
    const file = path.join(dir, 'channels.json')
    fs.writeFileSync(file, JSON.stringify({ ShopA: 'cookie-a', ShopB: { cookie: 'cookie-b' } }))

    const channels = await loadChannelDirectory(file)
    expect(channels.size()).toBe(2)
    expect(channels.credentialFor('shopb')).toBe('cookie-b')
  })

  it('falls back to an empty directory when the file is missing or broken', async () => {
    expect((await loadChannelDirectory(path.join(dir, 'missing.json'))).size()).toBe(0)

    const broken = path.join(dir, 'broken.json')
    fs.writeFileSync(broken, '{ not json')
    expect((await loadChannelDirectory(broken)).size()).toBe(0)
  })
})
