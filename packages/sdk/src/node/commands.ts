/**
 * Processing-server request commands
 */

import { open, rm, type FileHandle } from 'node:fs/promises'
import { z } from 'zod'
import type { HttpRequest } from '@media-relay/shared/types'
import { ErrorCode } from '@media-relay/shared/errors'
import { ALERT_TITLES, NODE_ENDPOINTS } from '../core/constants'
import { withQuery } from '../http/request'
import { COMMAND_SUCCESS, commandFailure, type CommandResult } from '../queue/command'
import { RelayError, fileError, toRelayError } from '../utils/error'
import type { NodeClient } from './client'
import { NodeCommand } from './command'

export const nodeStatusSchema = z.object({
  status: z.string(),
  activeSessions: z.number().int(),
  maxSessions: z.number().int(),
})

export type NodeStatus = z.infer<typeof nodeStatusSchema>

export class GetNodeStatus extends NodeCommand<NodeStatus> {
  constructor(client: NodeClient) {
    super(client, {
      path: NODE_ENDPOINTS.NODE.STATUS,
      method: 'GET',
      expect: nodeStatusSchema,
      errorTitle: ALERT_TITLES.NODE_STATUS,
    })
  }

  protected override onValidResponse(status: NodeStatus): CommandResult {
    this.client.updateStatus(status)
    return COMMAND_SUCCESS
  }
}

/**
 * Refresh the remote file list the upload leg checks against
 */
export class ListProjectFiles extends NodeCommand<string[]> {
  constructor(client: NodeClient) {
    super(client, {
      path: withQuery(NODE_ENDPOINTS.PROJECT.LIST, { folder: 'data' }),
      method: 'GET',
      expect: z.array(z.string()),
      errorTitle: ALERT_TITLES.PROJECT_LIST,
    })
  }

  override async execute(): Promise<CommandResult> {
    if (!this.client.project) {
      return commandFailure(
        new RelayError('No project is loaded', ErrorCode.PROJECT_NOT_LOADED),
        ALERT_TITLES.PROJECT_LIST
      )
    }
    return super.execute()
  }

  protected override onValidResponse(files: string[]): CommandResult {
    this.client.setFileList(files)
    return COMMAND_SUCCESS
  }
}

/**
 * Fetch a processed file from the project's output folder into `destination`
 */
export class DownloadProjectFile extends NodeCommand<unknown> {
  constructor(
    client: NodeClient,
    private readonly fileName: string,
    private readonly destination: string
  ) {
    super(client, {
      path: withQuery(NODE_ENDPOINTS.PROJECT.DOWNLOAD, { name: fileName, folder: 'output' }),
      method: 'GET',
      expect: z.unknown(),
      errorTitle: ALERT_TITLES.PROJECT_DOWNLOAD,
    })
  }

  override async execute(): Promise<CommandResult> {
    const result = await super.execute()
    if (!result.success) {
      try {
        await rm(this.destination, { force: true })
      } catch (error) {
        this.client.logger.warn('Could not remove partial download', {
          path: this.destination,
          error: toRelayError(error).message,
        })
      }
    }
    return result
  }

  /**
   * The body goes straight to disk; only the head comes back
   */
  protected override async send(request: HttpRequest): Promise<Buffer> {
    let handle: FileHandle
    try {
      handle = await open(this.destination, 'w')
    } catch (error) {
      throw fileError(error, this.destination, 'open')
    }
    try {
      return await this.client.connection.downloadToFile(request, handle)
    } finally {
      await handle.close()
    }
  }

  protected override onValidResponse(): CommandResult {
    this.client.logger.info('Downloaded project file', {
      file: this.fileName,
      path: this.destination,
    })
    return COMMAND_SUCCESS
  }
}
