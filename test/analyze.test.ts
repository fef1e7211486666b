import { describe, expect, it } from 'vitest'
import { contractLevel, detectIncomplete, hcp, partner, tricksOverContract } from '../src/analyze'
import { convertCards } from '../src/hands'
import { reconstructDeal } from '../src/lin_parser'
import { ContractLevel } from '../src/types'
import type { Contract } from '../src/types'
import { readFixture } from './helpers'

const bid = (level: number, strain: 'C' | 'D' | 'H' | 'S' | 'N'): Contract =>
  ({ kind: 'bid', level, strain, doubled: 0 })

describe('hcp', () => {
  it('counts 4-3-2-1 for each seat', () => {
    const deal = reconstructDeal(readFixture('complete.lin'))
    expect(deal.hands.map(hand => hcp(hand))).toEqual([12, 14, 4, 10])
  })

  it('adds shortness points', () => {
    const deal = reconstructDeal(readFixture('complete.lin'))
    expect(deal.hands.map(hand => hcp(hand, true))).toEqual([13, 16, 5, 11])
  })

  it('scores three voids', () => {
    expect(hcp(convertCards('SAKQJT98765432HDC'), true)).toBe(19)
  })
})

describe('partner', () => {
  it('sits opposite', () => {
    expect(partner('S')).toBe('N')
    expect(partner('W')).toBe('E')
    expect(partner('E')).toBe('W')
  })
})

describe('contractLevel', () => {
  it('classifies by level and strain', () => {
    expect(contractLevel({ kind: 'passedOut' })).toBe(ContractLevel.PASSOUT)
    expect(contractLevel(bid(2, 'N'))).toBe(ContractLevel.PARTIAL)
    expect(contractLevel(bid(3, 'N'))).toBe(ContractLevel.GAME)
    expect(contractLevel(bid(3, 'S'))).toBe(ContractLevel.PARTIAL)
    expect(contractLevel(bid(4, 'H'))).toBe(ContractLevel.GAME)
    expect(contractLevel(bid(4, 'D'))).toBe(ContractLevel.PARTIAL)
    expect(contractLevel(bid(5, 'C'))).toBe(ContractLevel.GAME)
    expect(contractLevel(bid(6, 'C'))).toBe(ContractLevel.SLAM)
    expect(contractLevel(bid(7, 'N'))).toBe(ContractLevel.GRANDSLAM)
  })
})

describe('detectIncomplete', () => {
  it('flags a missing deal', () => {
    expect(detectIncomplete(null)).toBe(true)
  })

  it('accepts full play and claims', () => {
    expect(detectIncomplete(reconstructDeal(readFixture('complete.lin')))).toBe(false)
    expect(detectIncomplete(reconstructDeal(readFixture('claimed.lin')))).toBe(false)
    expect(detectIncomplete(reconstructDeal(readFixture('passout.lin')))).toBe(false)
  })

  it('flags play that stops without a claim', () => {
    const lin = readFixture('claimed.lin').replace('mc|4|', '')
    expect(detectIncomplete(reconstructDeal(lin))).toBe(true)
  })
})

describe('tricksOverContract', () => {
  it('measures against level plus book', () => {
    expect(tricksOverContract(reconstructDeal(readFixture('complete.lin')))).toBe(-7)
    expect(tricksOverContract(reconstructDeal(readFixture('passout.lin')))).toBe(0)
  })
})
