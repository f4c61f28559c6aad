/**
 * Queue commands driving the two legs. The legs own the logic; these only
 * give the executor something to order, retry and count by name.
 */

import type { LocalFile, MediaFile, WaitingFile } from '@media-relay/shared/types'
import type { Command, CommandResult } from '../queue/command'
import type { DownloadLeg } from './download-leg'
import type { UploadLeg } from './upload-leg'

export class StartDownload implements Command {
  constructor(
    private readonly leg: DownloadLeg,
    private readonly files: MediaFile[],
    private readonly temporary: boolean
  ) {}

  execute(): Promise<CommandResult> {
    return this.leg.start(this.files, this.temporary)
  }
}

/**
 * Moves one file; queues itself again for the next
 */
export class DownloadMedia implements Command {
  constructor(private readonly leg: DownloadLeg) {}

  execute(): Promise<CommandResult> {
    return this.leg.step()
  }

  onRetriesExhausted(): void {
    this.leg.halt()
  }
}

/**
 * Drops hand-off downloads whose upload went away
 */
export class DropHandOffs implements Command {
  constructor(
    private readonly leg: DownloadLeg,
    private readonly fileNames: string[]
  ) {}

  execute(): Promise<CommandResult> {
    return this.leg.dropHandOffs(this.fileNames)
  }
}

export class StopDownload implements Command {
  constructor(private readonly leg: DownloadLeg) {}

  execute(): Promise<CommandResult> {
    return this.leg.finish()
  }
}

export class StartUpload implements Command {
  constructor(
    private readonly leg: UploadLeg,
    private readonly files: LocalFile[],
    private readonly waiting: WaitingFile[],
    private readonly startIfUserPaused: boolean
  ) {}

  execute(): Promise<CommandResult> {
    return this.leg.start(this.files, this.waiting, this.startIfUserPaused)
  }
}

export class UploadMedia implements Command {
  constructor(private readonly leg: UploadLeg) {}

  execute(): Promise<CommandResult> {
    return this.leg.step()
  }

  onRetriesExhausted(): void {
    this.leg.halt()
  }
}

export class StopUpload implements Command {
  constructor(private readonly leg: UploadLeg) {}

  execute(): Promise<CommandResult> {
    return this.leg.finish()
  }
}
