import { Hand, parseCard, cardToString } from './cards'
import type { Suit } from './cards'
import { nextSeat, seatOf, partnerOf, TRICKS_PER_DEAL } from './constants'
import { MalformedPlayError } from './errors'
import type { Direction, Play, Seats, Strain, Trick } from './types'

export type PlayStatus = 'playing' | 'completed' | 'claimed'

/**
 * Replay state. `completed` is reached after thirteen full tricks;
 * `claimed` when the card stream stops short, either on a partial trick or
 * on a trick boundary before the thirteenth.
 */
export type PlayState = {
  status: PlayStatus
  leader: Direction
  trump: Suit | null
  declarer: Direction
  tricksWon: number
  tricks: Trick[]
}

export const initialPlayState = (declarer: Direction, strain: Strain): PlayState => ({
  status: 'playing',
  leader: nextSeat(declarer),
  trump: strain == 'N' ? null : strain,
  declarer,
  tricksWon: 0,
  tricks: []
})

/**
 * Winner of a full trick, `plays` given in play order from the leader. A
 * card takes over when it beats the best card so far in that card's suit
 * (the led suit, or trumps once someone has ruffed), or when it is the first
 * trump.
 */
export const trickWinner = (plays: Play[], trump: Suit | null): Direction => {
  let top = plays[0]
  for (const play of plays.slice(1)) {
    const { card } = play
    if (card.suit == top.card.suit && card.rank > top.card.rank) {
      top = play
    } else if (trump !== null && card.suit == trump && top.card.suit != trump) {
      top = play
    }
  }
  return top.seat
}

export const playTrick = (state: PlayState, tokens: string[], held: Seats<Hand>): PlayState => {
  if (state.status == 'completed') {
    throw new MalformedPlayError(`more than ${TRICKS_PER_DEAL} tricks`)
  }
  if (state.status == 'claimed') {
    throw new MalformedPlayError(`short trick ${state.tricks.length} is not the last`)
  }
  if (tokens.length > 4) {
    throw new MalformedPlayError(`trick ${state.tricks.length + 1} has ${tokens.length} cards`)
  }
  const plays: Play[] = tokens.map((token, i) => {
    const card = parseCard(token)
    if (!card) {
      throw new MalformedPlayError(`'${token}' is not a card`)
    }
    const seat = nextSeat(state.leader, i)
    if (!seatOf(held, seat).remove(card)) {
      throw new MalformedPlayError(`${seat} cannot play ${cardToString(card)}`)
    }
    return { seat, card }
  })
  if (plays.length < 4) {
    return {
      ...state,
      status: 'claimed',
      tricks: [...state.tricks, { leader: state.leader, plays }]
    }
  }
  const winner = trickWinner(plays, state.trump)
  const declaring = winner == state.declarer || winner == partnerOf(state.declarer)
  const tricks = [...state.tricks, { leader: state.leader, plays, winner }]
  return {
    ...state,
    status: tricks.length == TRICKS_PER_DEAL ? 'completed' : 'playing',
    leader: winner,
    tricksWon: state.tricksWon + (declaring ? 1 : 0),
    tricks
  }
}

export const replayPlay = (tricks: string[][], declarer: Direction, strain: Strain,
  hands: Seats<Hand>): PlayState => {
  const held: Seats<Hand> = [
    new Hand(hands[0].cards),
    new Hand(hands[1].cards),
    new Hand(hands[2].cards),
    new Hand(hands[3].cards)
  ]
  const state = tricks.reduce((current, tokens) => playTrick(current, tokens, held),
    initialPlayState(declarer, strain))
  return state.status == 'playing' ? { ...state, status: 'claimed' } : state
}

/**
 * The claim tag carries the declarer's total and overrides the replayed
 * count.
 */
export const applyClaim = (state: PlayState, claim: string | undefined) => {
  if (claim === undefined) {
    return { tricksMade: state.tricksWon, claimed: false }
  }
  const tricks = /^\d+$/.test(claim) ? parseInt(claim) : NaN
  if (!(tricks >= 0 && tricks <= TRICKS_PER_DEAL)) {
    throw new MalformedPlayError(`claim of '${claim}' tricks`)
  }
  return { tricksMade: tricks, claimed: true }
}
