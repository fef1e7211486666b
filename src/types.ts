import type { Card, Hand } from './cards'

export enum ContractLevel {
  PASSOUT = 0,
  PARTIAL = 1,
  GAME = 2,
  SLAM = 3,
  GRANDSLAM = 4
}
export enum Vul {
  NONE = 0,
  ALL = 1,
  NS = 2,
  EW = 3
}

export type Direction = 'S' | 'W' | 'N' | 'E'
// Indexed by bboDir: South, West, North, East
export type Seats<T> = readonly [T, T, T, T]

export type Strain = 'C' | 'D' | 'H' | 'S' | 'N'
export type Call =
  | { kind: 'pass' }
  | { kind: 'double' }
  | { kind: 'redouble' }
  | { kind: 'bid', level: number, strain: Strain }
export type Contract =
  | { kind: 'passedOut' }
  | { kind: 'bid', level: number, strain: Strain, doubled: 0 | 1 | 2 }

export type Play = {
  seat: Direction
  card: Card
}
export type Trick = {
  leader: Direction
  plays: Play[]
  winner?: Direction
}

export type Deal = {
  readonly players: Seats<string>
  readonly dealer: Direction
  readonly hands: Seats<Hand>
  readonly bids: readonly Call[]
  readonly contract: Contract
  readonly declarer: Direction | null
  readonly vulnerability: Vul | null
  readonly play: readonly Trick[]
  readonly tricksMade: number
  readonly claimed: boolean
}

export type Board = {
  file: string
  contract: string
  result: string
  declarer: string
  dealer: Direction
  vul: Vul | null
  playerIds: string[]
  hands: string[]
  bids: string[]
  lead: string
  tricksTaken: number
  tricksOverContract: number
  contractLevel: ContractLevel
  claimed: boolean
  incomplete: boolean
  hcp: number[]
}
