import _ from 'lodash'
import { nextSeat, partnerOf, strains } from './constants'
import { MalformedAuctionError } from './errors'
import type { Call, Contract, Direction } from './types'

export type AuctionResult = {
  calls: Call[]
  contract: Contract
  declarer: Direction | null
}

export const parseCall = (token: string): Call => {
  switch (token) {
    case 'P':
    case 'PASS':
      return { kind: 'pass' }
    case 'D':
    case 'X':
      return { kind: 'double' }
    case 'R':
    case 'XX':
      return { kind: 'redouble' }
  }
  const match = token.match(/^([1-7])(C|D|H|S|NT|N)$/)
  if (!match) {
    throw new MalformedAuctionError(`'${token}' is not a call`)
  }
  return { kind: 'bid', level: parseInt(match[1]), strain: strains[match[2]] }
}

export const callToString = (call: Call) => {
  switch (call.kind) {
    case 'pass':
      return 'P'
    case 'double':
      return 'X'
    case 'redouble':
      return 'XX'
    case 'bid':
      return `${call.level}${call.strain}`
  }
}

/**
 * Finds the contract and declarer. The contract is the last bid once the
 * closing passes, doubles and redoubles are peeled off; the declarer is the
 * member of that side who first named the contract's strain.
 */
export const analyzeAuction = (tokens: string[], dealer: Direction): AuctionResult => {
  const calls = tokens.map(parseCall)
  if (calls.length == 4 && calls.every(call => call.kind == 'pass')) {
    return { calls, contract: { kind: 'passedOut' }, declarer: null }
  }
  let idx = calls.length - 1
  let doubled = 0
  while (idx >= 0 && calls[idx].kind != 'bid') {
    if (calls[idx].kind != 'pass') doubled++
    idx--
  }
  const last = calls[idx]
  if (idx < 0 || last.kind != 'bid') {
    throw new MalformedAuctionError(`no contract bid among ${calls.length} calls`)
  }
  if (doubled > 2) {
    throw new MalformedAuctionError(`${doubled} doubles after ${callToString(last)}`)
  }
  const firstMatch = _.findLast(_.range(idx, -1, -2), i => {
    const call = calls[i]
    return call.kind == 'bid' && call.strain == last.strain
  }) ?? idx
  const bidder = nextSeat(dealer, idx % 4)
  const declarer = ((idx - firstMatch) / 2) % 2 == 0 ? bidder : partnerOf(bidder)
  return {
    calls,
    contract: {
      kind: 'bid',
      level: last.level,
      strain: last.strain,
      doubled: doubled == 2 ? 2 : doubled == 1 ? 1 : 0
    },
    declarer
  }
}
