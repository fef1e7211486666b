import { Vul } from './types'
import type { Direction, Strain } from './types'

export const bboDir: Record<Direction, number> = {
  'S': 0,
  'W': 1,
  'N': 2,
  'E': 3,
}
export const bboNumtoDir: readonly Direction[] = ['S', 'W', 'N', 'E']
export const cardRank: {[key: string]: number} = {
  '2': 2,
  '3': 3,
  '4': 4,
  '5': 5,
  '6': 6,
  '7': 7,
  '8': 8,
  '9': 9,
  'T': 10,
  'J': 11,
  'Q': 12,
  'K': 13,
  'A': 14,
}
export const rankNames = ['', '', '2', '3', '4', '5', '6', '7', '8', '9', 'T', 'J', 'Q', 'K', 'A']
export const strains: {[key: string]: Strain} = {
  'C': 'C',
  'D': 'D',
  'H': 'H',
  'S': 'S',
  'N': 'N',
  'NT': 'N',
}
export const vulLetters: {[key: string]: Vul} = {
  'O': Vul.NONE,
  '0': Vul.NONE,
  '-': Vul.NONE,
  'N': Vul.NS,
  'S': Vul.NS,
  'E': Vul.EW,
  'W': Vul.EW,
  'B': Vul.ALL,
}

export const TRICKS_PER_DEAL = 13
export const BOOK = 6

export const nextSeat = (dir: Direction, offset = 1): Direction =>
  bboNumtoDir[(bboDir[dir] + offset) % 4]

export const partnerOf = (dir: Direction): Direction => nextSeat(dir, 2)

export const seatOf = <T>(seats: readonly [T, T, T, T], dir: Direction): T => seats[bboDir[dir]]
