/**
 * A file on the removable-storage device.
 * Identity is the file name: the same logical file may sit under a
 * temporary name while it is handed from one leg to the other.
 */
export interface MediaFile {
  fileName: string
  size: number
  createdAt?: Date
  valid: boolean
}

/**
 * An upload entry known only by name and size until its download completes
 */
export interface WaitingFile {
  fileName: string
  size: number
}

/**
 * A file present in local storage, ready to be uploaded
 */
export interface LocalFile {
  /** Absolute path; may carry the temporary prefix */
  path: string
  /** Name on the processing server, always without the temporary prefix */
  fileName: string
  size: number
  /** The local copy is a hand-off artefact and is deleted once uploaded */
  temporary: boolean
}
