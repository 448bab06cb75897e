import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { promises as fsp } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { collectFolderItems, uniqueDestination } from './localFiles'

let dir: string

beforeEach(async () => {
  dir = await fsp.mkdtemp(join(tmpdir(), 'hotline-local-'))
})

afterEach(async () => {
  await fsp.rm(dir, { recursive: true, force: true })
})

describe('uniqueDestination', () => {
  it('numbers the name until it is free', async () => {
    expect(await uniqueDestination(join(dir, 'a.txt'))).toBe(join(dir, 'a.txt'))

    await fsp.writeFile(join(dir, 'a.txt'), '')
    await fsp.writeFile(join(dir, 'a (1).txt'), '')

    expect(await uniqueDestination(join(dir, 'a.txt'))).toBe(join(dir, 'a (2).txt'))
  })
})

describe('collectFolderItems', () => {
  it('lists folders before their contents and skips hidden entries', async () => {
    await fsp.mkdir(join(dir, 'zeta'))
    await fsp.writeFile(join(dir, 'alpha.txt'), 'abc')
    await fsp.writeFile(join(dir, 'zeta', 'beta.txt'), 'hello')
    await fsp.writeFile(join(dir, '.DS_Store'), 'x')

    const items = await collectFolderItems(dir)

    expect(items).toEqual([
      { path: ['alpha.txt'], isFolder: false, localPath: join(dir, 'alpha.txt'), size: 3 },
      { path: ['zeta'], isFolder: true, localPath: join(dir, 'zeta'), size: 0 },
      { path: ['zeta', 'beta.txt'], isFolder: false, localPath: join(dir, 'zeta', 'beta.txt'), size: 5 }
    ])
  })
})
