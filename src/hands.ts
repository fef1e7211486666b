import { Hand, fullDeck, isSuit, cardToString } from './cards'
import type { Suit } from './cards'
import { bboNumtoDir, cardRank, TRICKS_PER_DEAL } from './constants'
import { CorruptEncodingError } from './errors'
import type { Direction, Seats } from './types'

export const parseDealer = (digit: string): Direction => {
  if (!/^[1-4]$/.test(digit)) {
    throw new CorruptEncodingError(`dealer digit '${digit}' is not 1-4`)
  }
  return bboNumtoDir[(parseInt(digit) - 1) % 4]
}

/**
 * Walks one dealt-hand blob such as `SAK4HJ4DQJ42CKQ95`. Each suit letter
 * opens a segment and every following rank character belongs to it, so the
 * letters alone decide the suit whatever order the segments come in.
 */
export const convertCards = (blob: string): Hand => {
  const hand = new Hand()
  let suit: Suit | undefined
  for (const ch of blob.toUpperCase()) {
    if (isSuit(ch)) {
      suit = ch
      continue
    }
    const rank = cardRank[ch]
    if (rank === undefined || suit === undefined) {
      throw new CorruptEncodingError(`unexpected '${ch}' in hand '${blob}'`)
    }
    hand.add({ suit, rank })
  }
  return hand
}

/**
 * Builds all four hands from the South, West and North blobs. East is what
 * is left of the deck once the other three are removed.
 */
export const reconstructHands = (blobs: string[]): Seats<Hand> => {
  if (blobs.length < 3) {
    throw new CorruptEncodingError(`expected at least 3 hands, found ${blobs.length}`)
  }
  const known = blobs.slice(0, 3).map(convertCards)
  const rest = fullDeck()
  known.forEach((hand, idx) => {
    if (hand.size != TRICKS_PER_DEAL) {
      throw new CorruptEncodingError(`${bboNumtoDir[idx]} holds ${hand.size} cards`)
    }
    for (const card of hand.cards) {
      if (!rest.remove(card)) {
        throw new CorruptEncodingError(`${cardToString(card)} dealt to more than one hand`)
      }
    }
  })
  if (blobs.length > 3 && blobs[3].length > 0) {
    const listed = convertCards(blobs[3])
    if (listed.size != rest.size || !rest.cards.every(card => listed.has(card))) {
      throw new CorruptEncodingError(`listed East hand ${listed.toLin()} does not match ${rest.toLin()}`)
    }
  }
  rest.sort()
  return [known[0], known[1], known[2], rest]
}
