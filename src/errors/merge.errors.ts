export type MergeErrorCode =
  | 'INVALID_ARGUMENT'
  | 'MISSING_INPUT_FILE'
  | 'TIMESTAMP_PARSE_ERROR'
  | 'EMPTY_TRACK'
  | 'GPX_FORMAT_ERROR'

/**
 * Base class for every condition that ends a merge run.
 * The command layer reports these and exits without writing output.
 */
export class MergeError extends Error {
  constructor(
    readonly code: MergeErrorCode,
    message: string,
  ) {
    super(message)
    this.name = new.target.name
  }
}

export class InvalidArgumentError extends MergeError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message)
  }
}

export class MissingInputFileError extends MergeError {
  constructor(readonly path: string) {
    super('MISSING_INPUT_FILE', `Input file not found: ${path}`)
  }
}

export class TimestampParseError extends MergeError {
  constructor(readonly raw: string) {
    super('TIMESTAMP_PARSE_ERROR', `Unparseable timestamp: '${raw}'`)
  }
}

export class EmptyTrackError extends MergeError {
  constructor(readonly path?: string) {
    super(
      'EMPTY_TRACK',
      path
        ? `No track points found in ${path}. Please check the GPS file validity.`
        : 'No track points found. Please check the GPS file validity.',
    )
  }
}

export class GpxFormatError extends MergeError {
  constructor(message: string) {
    super('GPX_FORMAT_ERROR', message)
  }
}
