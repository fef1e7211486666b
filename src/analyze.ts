import _ from 'lodash'
import type { Hand } from './cards'
import { BOOK, partnerOf, TRICKS_PER_DEAL } from './constants'
import { ContractLevel } from './types'
import type { Contract, Deal, Direction } from './types'

const honourPoints: {[key: number]: number} = {
  11: 1,
  12: 2,
  13: 3,
  14: 4,
}
// Indexed by suit length: void, singleton, doubleton
const shortnessPoints = [3, 2, 1]

/**
 * A deal is incomplete when it could not be parsed, or when play stops
 * before the last trick without a claim to account for the rest.
 */
export const detectIncomplete = (deal: Deal | null) =>
  deal === null || (deal.contract.kind != 'passedOut' && deal.play.length < TRICKS_PER_DEAL && !deal.claimed)

export const partner = (dir: Direction) => partnerOf(dir)

export const hcp = (hand: Hand, shortness = false) => {
  const points = _.sumBy(hand.cards, card => honourPoints[card.rank] ?? 0)
  if (!shortness) return points
  return points + _.sumBy(Object.values(hand.suitLengths()), length => shortnessPoints[length] ?? 0)
}

export const contractLevel = (contract: Contract) => {
  if (contract.kind == 'passedOut') return ContractLevel.PASSOUT
  if (contract.level == 7) return ContractLevel.GRANDSLAM
  if (contract.level == 6) return ContractLevel.SLAM
  switch (contract.strain) {
    case 'H':
    case 'S':
      return contract.level >= 4 ? ContractLevel.GAME : ContractLevel.PARTIAL
    case 'C':
    case 'D':
      return contract.level == 5 ? ContractLevel.GAME : ContractLevel.PARTIAL
    case 'N':
      return contract.level >= 3 ? ContractLevel.GAME : ContractLevel.PARTIAL
  }
}

export const tricksOverContract = (deal: Deal) => {
  if (deal.contract.kind == 'passedOut') return 0
  return deal.tricksMade - (deal.contract.level + BOOK)
}
