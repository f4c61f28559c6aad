/**
 * Upload leg against an in-process processing server
 */

import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { LocalFile } from '@media-relay/shared/types'
import { MetricsCollector } from '../../src/monitoring/metrics'
import { NodeClient } from '../../src/node/client'
import { LocalMediaStore } from '../../src/storage/local-store'
import { UploadLeg, missingUploadsNotice } from '../../src/transfer/upload-leg'
import { RecordingReporter } from '../helpers/commands'
import { RecordingUploadLinks } from '../helpers/links'
import { ProjectServerStub } from '../helpers/project-server'

describe('UploadLeg', () => {
  let dir: string
  let store: LocalMediaStore
  let stub: ProjectServerStub
  let client: NodeClient
  let reporter: RecordingReporter
  let metrics: MetricsCollector
  let links: RecordingUploadLinks
  let leg: UploadLeg

  async function localFile(name: string, size: number): Promise<LocalFile> {
    const path = join(dir, name)
    await writeFile(path, Buffer.alloc(size, name.charCodeAt(name.length - 1)))
    return store.describe(path)
  }

  async function connectWith(remoteFiles: string[]): Promise<void> {
    stub.remoteFiles = remoteFiles
    expect(await client.connect(['10.0.0.5'], 'test-token')).toBe(true)
    client.loadProject('wedding')
    await client.queue.whenIdle()
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'media-relay-upload-'))
    store = new LocalMediaStore(dir)
    stub = new ProjectServerStub()
    reporter = new RecordingReporter()
    metrics = new MetricsCollector()
    client = new NodeClient({
      connector: stub.server.connector,
      chunkSize: 64,
      retryDelay: 1,
      reconnect: { maxRetries: 2, initialDelay: 1, maxDelay: 5, factor: 1 },
      reporter,
      metrics,
    })
    links = new RecordingUploadLinks()
    leg = new UploadLeg({ node: client, store, links, reporter, metrics, speedInterval: 10_000 })
  })

  afterEach(async () => {
    client.disconnect()
    await rm(dir, { recursive: true, force: true })
  })

  it('posts each file to the project and records it remotely', async () => {
    await connectWith([])
    const a = await localFile('A.MP4', 100)
    const b = await localFile('B.MP4', 30)

    leg.request([a, b])
    await client.queue.whenIdle()

    expect(stub.uploads.map(request => request.path)).toEqual([
      '/project/command?name=add&param1=A.MP4',
      '/project/command?name=add&param1=B.MP4',
    ])
    expect(stub.uploads[0]?.headers).toEqual({
      Authorization: 'Bearer test-token',
      'Content-Length': '100',
    })
    expect(stub.uploads[0]?.body.equals(await readFile(a.path))).toBe(true)
    expect([...(client.project?.fileList ?? [])]).toEqual(['A.MP4', 'B.MP4'])
    expect(metrics.getMetrics()).toMatchObject({ filesUploaded: 2, bytesUploaded: 130 })
    expect(leg.active).toBe(false)
  })

  it('skips files the project already has and reports missing local copies', async () => {
    await connectWith(['A.MP4'])
    const a = await localFile('A.MP4', 10)
    const c = await localFile('C.MP4', 10)
    const missing: LocalFile = { path: join(dir, 'B.MP4'), fileName: 'B.MP4', size: 10, temporary: false }

    leg.request([a, missing, c])
    await client.queue.whenIdle()

    expect(stub.uploadedNames).toEqual(['C.MP4'])
    expect(reporter.alerts).toEqual([{ title: 'Files Skipped', message: missingUploadsNotice(1) }])
    expect(links.cancelled).toEqual([])
  })

  it('releases hand-off downloads for files the project already has', async () => {
    await connectWith(['A.MP4'])

    leg.request([], [{ fileName: 'A.MP4', size: 100 }])
    await client.queue.whenIdle()

    expect(links.cancelled).toEqual([['A.MP4']])
    expect(leg.active).toBe(false)
  })

  it('deletes a hand-off copy once it is uploaded', async () => {
    await connectWith([])
    const handOff = await localFile('_tmp.A.MP4', 50)
    expect(handOff).toMatchObject({ fileName: 'A.MP4', temporary: true })

    leg.request([handOff])
    await client.queue.whenIdle()

    expect(stub.uploadedNames).toEqual(['A.MP4'])
    expect(await readdir(dir)).toEqual([])
  })

  it('waits on entries still being downloaded', async () => {
    await connectWith([])

    leg.request([], [{ fileName: 'A.MP4', size: 100 }])
    await client.queue.whenIdle()

    expect(leg.snapshot).toMatchObject({
      pending: [],
      waiting: ['A.MP4'],
      paused: true,
      forcePaused: true,
      pausedReason: 'dependency',
      totalBytes: 100,
      totalFiles: 1,
    })

    leg.request([await localFile('A.MP4', 100)], [], { startIfUserPaused: false })
    await client.queue.whenIdle()

    expect(stub.uploadedNames).toEqual(['A.MP4'])
    expect(leg.active).toBe(false)
  })

  it('gives up on a waiter whose download was cancelled', async () => {
    await connectWith([])
    leg.request([], [{ fileName: 'A.MP4', size: 100 }])
    await client.queue.whenIdle()

    leg.downloadCancelledFor(['A.MP4'])
    await client.queue.whenIdle()

    expect(leg.snapshot).toBeUndefined()
    expect(stub.uploads).toEqual([])
  })

  it('drops a file the server rejects and carries on', async () => {
    await connectWith([])
    stub.respondToUpload = (request, reply) => {
      if (request.path.endsWith('param1=A.MP4')) {
        reply.json(200, { code: 3, message: 'Unsupported format' })
      } else {
        reply.json(200, { taskID: 'task-2' })
      }
    }

    leg.request([await localFile('A.MP4', 20), await localFile('B.MP4', 20)])
    await client.queue.whenIdle()

    expect(reporter.alerts).toEqual([{ title: 'Error Uploading Media', message: 'Unsupported format' }])
    expect([...(client.project?.fileList ?? [])]).toEqual(['B.MP4'])
  })

  it('removes a hand-off copy the server rejects', async () => {
    await connectWith([])
    stub.respondToUpload = (_request, reply) => reply.json(200, { code: 3, message: 'Unsupported format' })

    leg.request([await localFile('_tmp.A.MP4', 50)])
    await client.queue.whenIdle()

    expect(reporter.alerts).toEqual([{ title: 'Error Uploading Media', message: 'Unsupported format' }])
    expect(await readdir(dir)).toEqual([])
    expect(leg.active).toBe(false)
  })

  it('holds the set without a loaded project until resumed', async () => {
    expect(await client.connect(['10.0.0.5'], 'test-token')).toBe(true)

    leg.request([await localFile('A.MP4', 20)])
    await client.queue.whenIdle()

    expect(reporter.alerts).toEqual([{ title: 'Error Uploading Media', message: 'No project is loaded' }])
    expect(stub.uploads).toEqual([])
    expect(leg.snapshot).toMatchObject({ paused: true, forcePaused: false, pausedReason: 'failed' })

    client.loadProject('wedding')
    await client.queue.whenIdle()
    leg.resume()
    await client.queue.whenIdle()

    expect(stub.uploadedNames).toEqual(['A.MP4'])
    expect(leg.active).toBe(false)
  })

  describe('with the server holding its reply', () => {
    let release: (() => void) | undefined

    beforeEach(async () => {
      await connectWith([])
      release = undefined
      stub.respondToUpload = (_request, reply) => {
        release = () => reply.json(200, { taskID: 1 })
      }
    })

    it('pauses at the next file boundary and resumes', async () => {
      leg.request([await localFile('A.MP4', 20), await localFile('B.MP4', 20)])
      await vi.waitFor(() => expect(release).toBeDefined())

      leg.pause()
      release?.()
      await client.queue.whenIdle()

      expect(leg.snapshot).toMatchObject({
        pending: ['B.MP4'],
        paused: true,
        pausedReason: 'user',
        transferredFiles: 1,
        transferredBytes: 20,
      })

      stub.respondToUpload = (_request, reply) => reply.json(200, { taskID: 2 })
      leg.resume()
      await client.queue.whenIdle()

      expect(stub.uploadedNames).toEqual(['A.MP4', 'B.MP4'])
      expect(leg.active).toBe(false)
    })

    it('stops the set, releasing waiters and deleting hand-off copies', async () => {
      const handOff = await localFile('_tmp.B.MP4', 20)
      leg.request([await localFile('A.MP4', 20), handOff], [{ fileName: 'C.MP4', size: 10 }])
      await vi.waitFor(() => expect(release).toBeDefined())

      leg.stop()
      release?.()
      await client.queue.whenIdle()

      expect(stub.uploadedNames).toEqual(['A.MP4'])
      expect(links.cancelled).toEqual([['C.MP4']])
      expect(leg.active).toBe(false)
      expect(await readdir(dir)).toEqual(['A.MP4'])
    })
  })
})
