import { analyzeAuction } from './auction'
import { parseDealer, reconstructHands } from './hands'
import { extractFields, requireField } from './linFields'
import { applyClaim, replayPlay } from './play'
import { vulLetters } from './constants'
import { CorruptEncodingError, LinParseError, MalformedPlayError } from './errors'
import type { Deal, Seats, Trick, Vul } from './types'

const parsePlayers = (names: string[]): Seats<string> => {
  if (names.length < 4) {
    throw new CorruptEncodingError(`expected 4 players, found ${names.length}`)
  }
  return [names[0], names[1], names[2], names[3]]
}

const parseVul = (letter: string | undefined): Vul | null => {
  if (letter === undefined) return null
  const vul = vulLetters[letter.toUpperCase()]
  if (vul === undefined) {
    throw new CorruptEncodingError(`unknown vulnerability '${letter}'`)
  }
  return vul
}

/**
 * Rebuilds the full deal from one record. Throws a LinParseError subclass
 * naming the first stage that could not complete.
 */
export const reconstructDeal = (lin: string): Deal => {
  const fields = extractFields(lin)
  const players = parsePlayers(requireField(fields, 'players'))
  const { dealer: digit, blobs } = requireField(fields, 'deal')
  const dealer = parseDealer(digit)
  const hands = reconstructHands(blobs)
  const { calls, contract, declarer } = analyzeAuction(requireField(fields, 'bids'), dealer)
  const vulnerability = parseVul(fields.vulnerability)
  const cards = fields.play ?? []

  let play: Trick[] = []
  let result = { tricksMade: 0, claimed: false }
  if (contract.kind == 'passedOut' || declarer === null) {
    if (cards.length > 0) {
      throw new MalformedPlayError('cards played on a passed-out deal')
    }
  } else {
    const state = replayPlay(cards, declarer, contract.strain, hands)
    play = state.tricks
    result = applyClaim(state, fields.claim)
  }
  return {
    players,
    dealer,
    hands,
    bids: calls,
    contract,
    declarer,
    vulnerability,
    play,
    ...result
  }
}

/** Returns null when the record cannot be reconstructed. */
const parseLin = (lin: string): Deal | null => {
  try {
    return reconstructDeal(lin)
  } catch (err) {
    if (err instanceof LinParseError) return null
    throw err
  }
}

export default parseLin
