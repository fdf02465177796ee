export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidArgumentError'
  }
}

export class InvalidSnapshotError extends Error {
  readonly reason: string

  constructor(reason: string) {
    super(`Invalid game snapshot: ${reason}`)
    this.name = 'InvalidSnapshotError'
    this.reason = reason
  }
}

export class StorageError extends Error {
  readonly key: string

  constructor(key: string, message: string, options?: { cause?: unknown }) {
    super(`${message} (${key})`, options)
    this.name = 'StorageError'
    this.key = key
  }
}
