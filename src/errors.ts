export type LinErrorKind = 'missingField' | 'corruptEncoding' | 'malformedAuction' | 'malformedPlay'

export type LinField = 'players' | 'deal' | 'bids' | 'play' | 'vulnerability' | 'claim'

export class LinParseError extends Error {
  kind: LinErrorKind

  constructor(kind: LinErrorKind, message: string) {
    super(message)
    this.name = 'LinParseError'
    this.kind = kind
  }
}

export class MissingFieldError extends LinParseError {
  field: LinField

  constructor(field: LinField) {
    super('missingField', `record has no ${field} field`)
    this.name = 'MissingFieldError'
    this.field = field
  }
}

export class CorruptEncodingError extends LinParseError {
  constructor(message: string) {
    super('corruptEncoding', message)
    this.name = 'CorruptEncodingError'
  }
}

export class MalformedAuctionError extends LinParseError {
  constructor(message: string) {
    super('malformedAuction', message)
    this.name = 'MalformedAuctionError'
  }
}

export class MalformedPlayError extends LinParseError {
  constructor(message: string) {
    super('malformedPlay', message)
    this.name = 'MalformedPlayError'
  }
}
