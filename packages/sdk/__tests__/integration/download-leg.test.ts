/**
 * Download leg against an in-memory device and a scratch media directory
 */

import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { TransferSnapshot } from '@media-relay/shared/types'
import { MetricsCollector } from '../../src/monitoring/metrics'
import { CommandQueueExecutor } from '../../src/queue/executor'
import { LocalMediaStore } from '../../src/storage/local-store'
import { DownloadLeg, skippedDownloadsNotice } from '../../src/transfer/download-leg'
import { RecordingReporter } from '../helpers/commands'
import { FakeDevice } from '../helpers/fake-device'
import { RecordingDownloadLinks } from '../helpers/links'

describe('DownloadLeg', () => {
  let dir: string
  let store: LocalMediaStore
  let queue: CommandQueueExecutor
  let device: FakeDevice
  let links: RecordingDownloadLinks
  let reporter: RecordingReporter
  let metrics: MetricsCollector
  let leg: DownloadLeg
  let snapshots: Array<TransferSnapshot | undefined>

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'media-relay-download-'))
    store = new LocalMediaStore(dir)
    reporter = new RecordingReporter()
    metrics = new MetricsCollector()
    queue = new CommandQueueExecutor({ enabled: true, retryDelay: 1, reporter, metrics })
    device = new FakeDevice(40)
    links = new RecordingDownloadLinks()
    leg = new DownloadLeg({ queue, device, store, links, reporter, metrics, speedInterval: 10_000 })
    snapshots = []
    leg.onChange(snapshot => snapshots.push(snapshot))
  })

  afterEach(async () => {
    queue.clear()
    await rm(dir, { recursive: true, force: true })
  })

  function lastSnapshot(): TransferSnapshot | undefined {
    return snapshots.filter(snapshot => snapshot !== undefined).at(-1)
  }

  it('downloads every file and promotes it to its final name', async () => {
    const files = [device.add('A.MP4', 100), device.add('B.MP4', 200), device.add('C.MP4', 50)]

    leg.request(files)
    await queue.whenIdle()

    expect((await readdir(dir)).sort()).toEqual(['A.MP4', 'B.MP4', 'C.MP4'])
    for (const file of files) {
      expect(await readFile(store.finalPath(file.fileName))).toEqual(device.content(file.fileName))
    }
    expect(lastSnapshot()).toMatchObject({
      pending: [],
      transferredFiles: 3,
      transferredBytes: 350,
      totalBytes: 350,
      percentComplete: 100,
    })
    expect(snapshots.at(-1)).toBeUndefined()
    expect(leg.active).toBe(false)
    expect(links.ready).toEqual([
      { path: store.finalPath('A.MP4'), fileName: 'A.MP4', size: 100, temporary: false },
      { path: store.finalPath('B.MP4'), fileName: 'B.MP4', size: 200, temporary: false },
      { path: store.finalPath('C.MP4'), fileName: 'C.MP4', size: 50, temporary: false },
    ])
    expect(metrics.getMetrics()).toMatchObject({ filesDownloaded: 3, bytesDownloaded: 350 })
  })

  it('resumes a failed file from the committed offset', async () => {
    const files = [device.add('A.MP4', 100), device.add('B.MP4', 200), device.add('C.MP4', 50)]
    device.failOnce('B.MP4', 40)

    leg.request(files)
    await queue.whenIdle()

    expect(device.reads).toEqual([
      { fileName: 'A.MP4', offset: 0 },
      { fileName: 'B.MP4', offset: 0 },
      { fileName: 'B.MP4', offset: 40 },
      { fileName: 'C.MP4', offset: 0 },
    ])
    expect(await readFile(store.finalPath('B.MP4'))).toEqual(device.content('B.MP4'))
    expect(metrics.getRetryCount('DownloadMedia')).toBe(1)
    expect(reporter.alerts).toEqual([])
  })

  it('holds the set once the retries for a file run out and resumes on request', async () => {
    const files = [device.add('A.MP4', 100), device.add('B.MP4', 50)]
    for (let i = 0; i < 4; i++) {
      device.failOnce('A.MP4', 40)
    }

    leg.request(files)
    await queue.whenIdle()

    expect(leg.snapshot).toMatchObject({
      paused: true,
      forcePaused: false,
      pausedReason: 'failed',
      current: 'A.MP4',
      currentOffset: 40,
      pending: ['A.MP4', 'B.MP4'],
    })
    expect(reporter.alerts.map(alert => alert.title)).toEqual(['Error Downloading Media'])
    expect(metrics.getRetryCount('DownloadMedia')).toBe(3)
    expect(device.reads).toHaveLength(4)

    leg.resume()
    await queue.whenIdle()

    expect(device.reads.slice(4)).toEqual([
      { fileName: 'A.MP4', offset: 40 },
      { fileName: 'B.MP4', offset: 0 },
    ])
    expect(await readFile(store.finalPath('A.MP4'))).toEqual(device.content('A.MP4'))
    expect(await readFile(store.finalPath('B.MP4'))).toEqual(device.content('B.MP4'))
    expect(leg.active).toBe(false)
  })

  it('skips invalid and already saved files with one notice', async () => {
    await writeFile(store.finalPath('A.MP4'), 'saved earlier')
    const files = [device.add('A.MP4', 100), device.add('X.MP4', 10, false), device.add('B.MP4', 60)]

    leg.request(files)
    await queue.whenIdle()

    expect(reporter.alerts).toEqual([{ title: 'Files Skipped', message: skippedDownloadsNotice(2) }])
    expect(links.cancelled).toEqual([['X.MP4']])
    expect(links.ready.map(file => file.fileName)).toEqual(['A.MP4', 'B.MP4'])
    expect(device.reads).toEqual([{ fileName: 'B.MP4', offset: 0 }])
    expect(await readFile(store.finalPath('A.MP4'), 'utf8')).toBe('saved earlier')
  })

  it('keeps a hand-off download under its temporary name', async () => {
    leg.request([device.add('A.MP4', 100)], { temporary: true })
    await queue.whenIdle()

    expect(links.ready).toEqual([
      { path: store.tempPath('A.MP4'), fileName: 'A.MP4', size: 100, temporary: true },
    ])
    expect(await readdir(dir)).toEqual(['_tmp.A.MP4'])
  })

  it('pauses at a chunk boundary and resumes byte-identical', async () => {
    const reached = device.stallAt('A.MP4', 40)
    leg.request([device.add('A.MP4', 100), device.add('B.MP4', 50)])
    await reached

    leg.pause()
    leg.pause()
    await queue.whenIdle()

    expect(leg.snapshot).toMatchObject({
      paused: true,
      forcePaused: false,
      pausedReason: 'user',
      current: 'A.MP4',
      currentOffset: 40,
      transferredBytes: 40,
      speed: 0,
    })

    leg.resume()
    await queue.whenIdle()

    expect(device.reads).toEqual([
      { fileName: 'A.MP4', offset: 0 },
      { fileName: 'A.MP4', offset: 40 },
      { fileName: 'B.MP4', offset: 0 },
    ])
    expect(await readFile(store.finalPath('A.MP4'))).toEqual(device.content('A.MP4'))
    expect(leg.active).toBe(false)
  })

  it('waits for the device to come back', async () => {
    device.connected = false
    leg.request([device.add('A.MP4', 100)])
    await queue.whenIdle()

    expect(leg.snapshot).toMatchObject({ paused: true, forcePaused: true, pausedReason: 'device' })

    leg.resume()
    await queue.whenIdle()
    expect(leg.snapshot?.pausedReason).toBe('device')

    device.connected = true
    leg.deviceReconnected()
    await queue.whenIdle()

    expect(await readFile(store.finalPath('A.MP4'))).toEqual(device.content('A.MP4'))
  })

  it('lets the user resume after a local storage failure', async () => {
    await mkdir(store.tempPath('A.MP4'))
    leg.request([device.add('A.MP4', 100)])
    await queue.whenIdle()

    expect(leg.snapshot).toMatchObject({ paused: true, forcePaused: false, pausedReason: 'storage' })
    expect(reporter.alerts.map(alert => alert.title)).toEqual(['Error Downloading Media'])
    expect(device.reads).toEqual([])

    await rm(store.tempPath('A.MP4'), { recursive: true })
    leg.resume()
    await queue.whenIdle()

    expect(await readFile(store.finalPath('A.MP4'))).toEqual(device.content('A.MP4'))
    expect(leg.active).toBe(false)
  })

  it('stops the whole set and discards the partial file', async () => {
    const reached = device.stallAt('A.MP4', 40)
    leg.request([device.add('A.MP4', 100), device.add('B.MP4', 50)])
    await reached

    leg.stop()
    await queue.whenIdle()

    expect(links.cancelled).toEqual([['A.MP4', 'B.MP4']])
    expect(leg.snapshot).toBeUndefined()
    expect(await readdir(dir)).toEqual([])
  })

  it('drops a hand-off download whose upload was cancelled', async () => {
    const reached = device.stallAt('A.MP4', 40)
    leg.request([device.add('A.MP4', 100), device.add('B.MP4', 50)], { temporary: true })
    await reached

    leg.uploadCancelledFor(['A.MP4'])
    await queue.whenIdle()

    expect(device.reads).toEqual([
      { fileName: 'A.MP4', offset: 0 },
      { fileName: 'B.MP4', offset: 0 },
    ])
    expect(links.ready.map(file => file.fileName)).toEqual(['B.MP4'])
    await vi.waitFor(async () => expect(await readdir(dir)).toEqual(['_tmp.B.MP4']))
  })

  it('drops a hand-off download cancelled while its temp file is opening', async () => {
    const open = store.openForWrite.bind(store)
    vi.spyOn(store, 'openForWrite').mockImplementationOnce(async (fileName, offset) => {
      leg.uploadCancelledFor(['A.MP4'])
      return open(fileName, offset)
    })
    leg.request([device.add('A.MP4', 100), device.add('B.MP4', 50)], { temporary: true })
    await queue.whenIdle()

    expect(device.reads).toEqual([{ fileName: 'B.MP4', offset: 0 }])
    expect(metrics.getRetryCount('DownloadMedia')).toBe(0)
    expect(links.ready.map(file => file.fileName)).toEqual(['B.MP4'])
    expect(await readdir(dir)).toEqual(['_tmp.B.MP4'])
  })

  it('ignores an upload cancellation for files it was asked to keep', async () => {
    const reached = device.stallAt('A.MP4', 40)
    leg.request([device.add('A.MP4', 100)])
    await reached

    leg.uploadCancelledFor(['A.MP4'])
    device.resume()
    await queue.whenIdle()

    expect(await readFile(store.finalPath('A.MP4'))).toEqual(device.content('A.MP4'))
  })

  it('forgets everything when abandoned', async () => {
    const reached = device.stallAt('A.MP4', 40)
    leg.request([device.add('A.MP4', 100), device.add('B.MP4', 50)])
    await reached

    leg.abandon()
    await queue.whenIdle()

    expect(links.cancelled).toEqual([['A.MP4', 'B.MP4']])
    expect(leg.active).toBe(false)
    expect(device.reads).toEqual([{ fileName: 'A.MP4', offset: 0 }])
  })
})
