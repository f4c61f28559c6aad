/**
 * LocalMediaStore unit tests against a scratch directory
 */

import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { ErrorCode } from '@media-relay/shared/errors'
import { LocalMediaStore } from '../../src/storage/local-store'

describe('LocalMediaStore', () => {
  let root: string
  let store: LocalMediaStore

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'media-relay-store-'))
    store = new LocalMediaStore(root)
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('names temporary copies with the prefix', () => {
    expect(store.tempPath('A.MP4')).toBe(join(root, '_tmp.A.MP4'))
    expect(store.finalPath('A.MP4')).toBe(join(root, 'A.MP4'))
    expect(store.isTemporary(join(root, '_tmp.A.MP4'))).toBe(true)
    expect(store.isTemporary(join(root, 'A.MP4'))).toBe(false)
    expect(store.displayName(join(root, '_tmp.A.MP4'))).toBe('A.MP4')
  })

  it('creates a missing root directory', async () => {
    const nested = new LocalMediaStore(join(root, 'media', 'card'))

    await nested.ensureRoot()

    expect(await nested.exists(nested.root)).toBe(true)
  })

  it('reports the root as unavailable when it cannot be created', async () => {
    await writeFile(join(root, 'blocker'), 'x')
    const blocked = new LocalMediaStore(join(root, 'blocker', 'media'))

    await expect(blocked.ensureRoot()).rejects.toMatchObject({
      code: ErrorCode.DIRECTORY_UNAVAILABLE,
    })
  })

  it('knows which files are saved', async () => {
    await writeFile(store.finalPath('A.MP4'), 'saved')

    expect(await store.isSaved('A.MP4')).toBe(true)
    expect(await store.isSaved('B.MP4')).toBe(false)
  })

  it('describes a temporary copy by its display name', async () => {
    await writeFile(store.tempPath('A.MP4'), '12345')

    expect(await store.describe(store.tempPath('A.MP4'))).toEqual({
      path: store.tempPath('A.MP4'),
      fileName: 'A.MP4',
      size: 5,
      temporary: true,
    })
  })

  describe('openForWrite', () => {
    it('starts a fresh file at offset zero', async () => {
      await writeFile(store.tempPath('A.MP4'), 'stale bytes')

      const target = await store.openForWrite('A.MP4', 0)
      await target.handle.write('new')
      await target.handle.close()

      expect(target.offset).toBe(0)
      expect(await readFile(target.path, 'utf8')).toBe('new')
    })

    it('appends when the file already holds the committed bytes', async () => {
      await writeFile(store.tempPath('A.MP4'), 'abc')

      const target = await store.openForWrite('A.MP4', 3)
      await target.handle.write('def')
      await target.handle.close()

      expect(target.offset).toBe(3)
      expect(await readFile(target.path, 'utf8')).toBe('abcdef')
    })

    it('cuts a longer file back to the committed offset', async () => {
      await writeFile(store.tempPath('A.MP4'), 'abcXYZ')

      const target = await store.openForWrite('A.MP4', 3)
      await target.handle.write('def')
      await target.handle.close()

      expect(await readFile(target.path, 'utf8')).toBe('abcdef')
    })

    it('resumes at the actual length of a shorter file', async () => {
      await writeFile(store.tempPath('A.MP4'), 'ab')

      const target = await store.openForWrite('A.MP4', 5)
      await target.handle.close()

      expect(target.offset).toBe(2)
    })

    it('restarts when the temp file has disappeared', async () => {
      const target = await store.openForWrite('A.MP4', 40)
      await target.handle.close()

      expect(target.offset).toBe(0)
    })
  })

  it('promotes a finished download to its final name', async () => {
    await writeFile(store.tempPath('A.MP4'), 'done')

    const path = await store.promote('A.MP4')

    expect(path).toBe(store.finalPath('A.MP4'))
    expect(await readdir(root)).toEqual(['A.MP4'])
  })

  it('fails to promote a missing temp file', async () => {
    await expect(store.promote('A.MP4')).rejects.toMatchObject({
      code: ErrorCode.FILE_NOT_FOUND,
      category: 'filesystem',
    })
  })

  it('copies a local copy under the final name', async () => {
    await writeFile(store.tempPath('A.MP4'), 'shared')

    await store.copyToFinal(store.tempPath('A.MP4'), 'A.MP4')

    expect(await readFile(store.finalPath('A.MP4'), 'utf8')).toBe('shared')
    expect(await store.exists(store.tempPath('A.MP4'))).toBe(true)
  })

  it('removes quietly when the file is already gone', async () => {
    await expect(store.remove(store.tempPath('A.MP4'))).resolves.toBeUndefined()
  })
})
