import { MissingFieldError } from './errors'
import type { LinField } from './errors'

export type LinToken = {
  tag: string
  value: string
}

export type LinFields = {
  players?: string[]
  deal?: {
    dealer: string
    blobs: string[]
  }
  bids?: string[]
  play?: string[][]
  vulnerability?: string
  claim?: string
}

/**
 * Splits a record into its `tag|value|` pairs. Line breaks carry no meaning
 * in the format and are dropped before splitting.
 */
export const tokenizeLin = (lin: string): LinToken[] => {
  const parts = lin.replace(/[\r\n]+/g, '').split('|')
  const tokens: LinToken[] = []
  for (let i = 0; i + 1 < parts.length; i += 2) {
    const tag = parts[i].trim().toLowerCase()
    if (tag.length == 0) continue
    tokens.push({ tag, value: parts[i + 1] })
  }
  return tokens
}

// `1S!` is an alerted 1S
export const cleanBid = (raw: string) => raw.trim().replace(/!+$/, '').toUpperCase()

export const extractFields = (lin: string): LinFields => {
  const fields: LinFields = {}
  let auction: 'before' | 'open' | 'closed' = 'before'
  let play: string[][] | undefined
  let playDone = false
  let trick: string[] = []
  const closeTrick = (tricks: string[][]) => {
    if (trick.length > 0) tricks.push(trick)
    trick = []
  }
  for (const { tag, value } of tokenizeLin(lin)) {
    switch (tag) {
      case 'pn':
        if (!fields.players) fields.players = value.split(',').map(name => name.trim())
        break
      case 'md':
        if (!fields.deal) {
          fields.deal = {
            dealer: value.substring(0, 1),
            blobs: value.substring(1).split(',').map(blob => blob.trim())
          }
        }
        break
      case 'sv':
        if (fields.vulnerability === undefined) fields.vulnerability = value.trim()
        break
      case 'mb':
        if (auction == 'closed') break
        auction = 'open'
        if (!fields.bids) fields.bids = []
        fields.bids.push(cleanBid(value))
        break
      case 'pc':
        if (auction == 'open') auction = 'closed'
        if (playDone) break
        if (!play) play = []
        trick.push(value.trim())
        break
      case 'pg':
        if (auction == 'open') auction = 'closed'
        if (play && !playDone) closeTrick(play)
        break
      case 'mc':
        if (fields.claim === undefined) fields.claim = value.trim()
        if (play && !playDone) {
          closeTrick(play)
          playDone = true
        }
        break
    }
  }
  if (play) {
    if (!playDone) closeTrick(play)
    fields.play = play
  }
  return fields
}

export const requireField = <K extends keyof LinFields & LinField>(fields: LinFields, field: K):
  NonNullable<LinFields[K]> => {
  const value = fields[field]
  if (value === undefined) {
    throw new MissingFieldError(field)
  }
  return value
}
