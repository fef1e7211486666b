import { callToString } from './auction'
import { cardToString } from './cards'
import { contractLevel, detectIncomplete, hcp, tricksOverContract } from './analyze'
import type { Board, Deal } from './types'

/** `4HSX` is four hearts doubled by South; a passed-out deal is `P`. */
export const formatContract = (deal: Deal) => {
  const { contract, declarer } = deal
  if (contract.kind == 'passedOut' || declarer === null) return 'P'
  return `${contract.level}${contract.strain}${declarer}${'X'.repeat(contract.doubled)}`
}

export const toBoard = (file: string, deal: Deal): Board => {
  const opening = deal.play.length > 0 ? deal.play[0].plays[0] : undefined
  return {
    file,
    contract: formatContract(deal),
    result: describeResult(deal),
    declarer: deal.declarer ?? '',
    dealer: deal.dealer,
    vul: deal.vulnerability,
    playerIds: [...deal.players],
    hands: deal.hands.map(hand => hand.toLin()),
    bids: deal.bids.map(callToString),
    lead: opening ? cardToString(opening.card) : '',
    tricksTaken: deal.tricksMade,
    tricksOverContract: tricksOverContract(deal),
    contractLevel: contractLevel(deal.contract),
    claimed: deal.claimed,
    incomplete: detectIncomplete(deal),
    hcp: deal.hands.map(hand => hcp(hand))
  }
}

export const numToString = (num: number): string => {
  return (num < 0 ? "" : "+") + num
}

/** Human-readable result such as `4HSX+1` or `3NN-2`. */
export const describeResult = (deal: Deal) => {
  const contract = formatContract(deal)
  if (contract == 'P') return contract
  const over = tricksOverContract(deal)
  return contract + (over == 0 ? '=' : numToString(over))
}
