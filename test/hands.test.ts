import { describe, expect, it } from 'vitest'
import { convertCards, parseDealer, reconstructHands } from '../src/hands'
import { cardToString } from '../src/cards'
import { CorruptEncodingError } from '../src/errors'
import { boardSevenBlobs, boardSevenEast } from './helpers'

describe('parseDealer', () => {
  it('maps 1-4 to South, West, North, East', () => {
    expect(['1', '2', '3', '4'].map(parseDealer)).toEqual(['S', 'W', 'N', 'E'])
  })

  it('rejects anything else', () => {
    expect(() => parseDealer('0')).toThrow(CorruptEncodingError)
    expect(() => parseDealer('S')).toThrow(CorruptEncodingError)
  })
})

describe('convertCards', () => {
  it('reads each suit segment', () => {
    const hand = convertCards('SAK4HJ4DQJ42CKQ95')
    expect(hand.size).toBe(13)
    expect(hand.cards.slice(0, 4).map(cardToString)).toEqual(['SA', 'SK', 'S4', 'HJ'])
  })

  it('lets the suit letters decide, whatever their order', () => {
    expect(convertCards('CKQ95DQJ42HJ4SAK4').toLin()).toBe('SAK4HJ4DQJ42CKQ95')
  })

  it('rejects unknown characters', () => {
    expect(() => convertCards('SAKZ')).toThrow("unexpected 'Z' in hand 'SAKZ'")
  })

  it('rejects a rank before any suit', () => {
    expect(() => convertCards('AKS2')).toThrow(CorruptEncodingError)
  })

  it('rejects a card listed twice', () => {
    expect(() => convertCards('SAKA')).toThrow(new CorruptEncodingError('SA is already in the hand'))
  })
})

describe('reconstructHands', () => {
  it('derives East as the rest of the deck', () => {
    const hands = reconstructHands([...boardSevenBlobs, ''])
    expect(hands.map(hand => hand.toLin())).toEqual([...boardSevenBlobs, boardSevenEast])
  })

  it('partitions the deck', () => {
    const hands = reconstructHands(boardSevenBlobs)
    const all = hands.flatMap(hand => hand.cards.map(cardToString))
    expect(all).toHaveLength(52)
    expect(new Set(all).size).toBe(52)
  })

  it('accepts a listed East hand that matches', () => {
    expect(reconstructHands([...boardSevenBlobs, boardSevenEast])[3].toLin()).toBe(boardSevenEast)
  })

  it('rejects a listed East hand that does not match', () => {
    expect(() => reconstructHands([...boardSevenBlobs, 'SJ865HAQ92DKT8CT3']))
      .toThrow(CorruptEncodingError)
  })

  it('rejects a card dealt twice', () => {
    const [south, , north] = boardSevenBlobs
    expect(() => reconstructHands([south, 'SKHKJTD9654CAQ876', north]))
      .toThrow('SK dealt to more than one hand')
  })

  it('rejects a short hand', () => {
    const [south, west] = boardSevenBlobs
    expect(() => reconstructHands([south, west, 'S9743H74DQJ32CJ9']))
      .toThrow('N holds 12 cards')
  })

  it('needs three hands', () => {
    expect(() => reconstructHands(boardSevenBlobs.slice(0, 2))).toThrow(CorruptEncodingError)
  })
})
