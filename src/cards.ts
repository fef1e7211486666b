import _ from 'lodash'
import { cardRank, rankNames } from './constants'
import { CorruptEncodingError } from './errors'

export type Suit = 'C' | 'D' | 'H' | 'S'
export type Card = {
  readonly suit: Suit
  readonly rank: number
}

export const suits: readonly Suit[] = ['C', 'D', 'H', 'S']
// Order the suits appear in within a dealt-hand blob
export const linSuitOrder: readonly Suit[] = ['S', 'H', 'D', 'C']

export const isSuit = (letter: string): letter is Suit => suits.some(suit => suit == letter)

export const cardEquals = (a: Card, b: Card) => a.suit == b.suit && a.rank == b.rank

export const cardToString = (card: Card) => card.suit + rankNames[card.rank]

/**
 * Reads a two-character play token such as `SA` or `HT`. Returns null when
 * either character is not a known suit or rank.
 */
export const parseCard = (token: string): Card | null => {
  const str = token.trim().toUpperCase()
  if (str.length != 2) return null
  const suit = str[0]
  const rank = cardRank[str[1]]
  if (!isSuit(suit) || rank === undefined) return null
  return { suit, rank }
}

/**
 * Comparator over cards for a caller-chosen suit order. Suits missing from
 * `suitOrder` sort last; within a suit ranks run high to low unless
 * `ascending` is set.
 */
export const compareCards = (suitOrder: readonly Suit[] = linSuitOrder, ascending = false) =>
  (a: Card, b: Card) => {
    const suitIdx = (card: Card) => {
      const idx = suitOrder.indexOf(card.suit)
      return idx == -1 ? suitOrder.length : idx
    }
    return suitIdx(a) - suitIdx(b) || (ascending ? a.rank - b.rank : b.rank - a.rank)
  }

export class Hand {
  readonly cards: Card[]

  constructor(cards: Card[] = []) {
    this.cards = [...cards]
  }

  get size() {
    return this.cards.length
  }

  has(card: Card) {
    return this.cards.some(c => cardEquals(c, card))
  }

  add(card: Card) {
    if (this.has(card)) {
      throw new CorruptEncodingError(`${cardToString(card)} is already in the hand`)
    }
    this.cards.push(card)
  }

  /** Returns false when the card was not in the hand. */
  remove(card: Card) {
    const idx = this.cards.findIndex(c => cardEquals(c, card))
    if (idx == -1) return false
    this.cards.splice(idx, 1)
    return true
  }

  pop(idx = -1): Card | undefined {
    if (this.cards.length == 0) return undefined
    const at = idx < 0 ? this.cards.length + idx : idx
    return this.cards.splice(at, 1)[0]
  }

  sort(suitOrder: readonly Suit[] = linSuitOrder, ascending = false) {
    this.cards.sort(compareCards(suitOrder, ascending))
    return this
  }

  suitLengths(): Record<Suit, number> {
    return {
      C: 0, D: 0, H: 0, S: 0,
      ..._.countBy(this.cards, card => card.suit)
    }
  }

  /** Record notation, e.g. `SAK4HJ4DQJ42CKQ95`. */
  toLin() {
    const bySuit = _.groupBy(this.cards, card => card.suit)
    return linSuitOrder.map(suit => suit + _.orderBy(bySuit[suit] ?? [], 'rank', 'desc')
      .map(card => rankNames[card.rank]).join('')).join('')
  }

  toString() {
    return this.cards.map(cardToString).join(',')
  }
}

export const fullDeck = () => new Hand(
  _.flatMap(suits, suit => _.range(2, 15).map(rank => ({ suit, rank }))))
