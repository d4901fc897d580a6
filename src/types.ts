/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export const CHAIN_IDS = ['BITCOIN', 'FRACTAL'] as const;
export type ChainId = (typeof CHAIN_IDS)[number];

export const PROTOCOL_IDS = ['ORDINAL', 'BRC20'] as const;
export type ProtocolId = (typeof PROTOCOL_IDS)[number];

//
// Receipts
//

export interface OrdinalEvent {
  inscriptionId: string;
  txid: string;
  action: string;
  owner: string | null;
  contentHash: string | null;
  sequence: number;
}

export type Brc20Operation =
  | 'deploy'
  | 'mint'
  | 'inscribe-transfer'
  | 'transfer'
  | 'burn';

export interface Brc20Entry {
  ticker: string; // lower-cased
  txid: string;
  operation: Brc20Operation;
  amount: string; // normalized decimal
  from: string | null;
  to: string | null;
  balanceDeltas: Record<string, string>; // address -> signed decimal
}

export interface OrdinalReceipts {
  protocol: 'ORDINAL';
  blockHash: string;
  events: OrdinalEvent[];
}

export interface Brc20Receipts {
  protocol: 'BRC20';
  blockHash: string;
  entries: Brc20Entry[];
}

export type Receipts = OrdinalReceipts | Brc20Receipts;

export type ReceiptsFor<P extends ProtocolId> = Extract<
  Receipts,
  { protocol: P }
>;

//
// Divergences and results
//

// Order matters: comparators sort entries sharing a key by this order
export const DIVERGENCE_KINDS = [
  'MISSING_IN_SECONDARY',
  'MISSING_IN_PRIMARY',
  'FIELD_MISMATCH',
  'COUNT_MISMATCH',
] as const;
export type DivergenceKind = (typeof DIVERGENCE_KINDS)[number];

export interface FieldDifference {
  field: string;
  primary: unknown;
  secondary: unknown;
}

export interface DivergenceDetail {
  key: string;
  message: string;
  fields?: FieldDifference[];
  primaryCount?: number;
  secondaryCount?: number;
}

export interface DivergenceEntry {
  height: number;
  kind: DivergenceKind;
  detail: DivergenceDetail;
}

export type BlockStatus = 'OK' | 'FETCH_FAILED' | 'FATAL';

export interface BlockResult {
  height: number;
  status: BlockStatus;
  divergences: DivergenceEntry[];
  error?: { name: string; message: string; endpoint?: string };
}

export interface ProtocolComparator<P extends ProtocolId = ProtocolId> {
  protocol: P;
  compare(
    height: number,
    primary: ReceiptsFor<P>,
    secondary: ReceiptsFor<P>,
  ): DivergenceEntry[];
}

//
// Endpoint capability
//

export interface ChainTip {
  height: number;
  network: string;
}

export interface ReceiptSource {
  readonly endpoint: string;
  getBlockReceipts(params: {
    chain: ChainId;
    protocol: ProtocolId;
    height: number;
    signal?: AbortSignal;
  }): Promise<Receipts>;
  getTip(params: { chain: ChainId; signal?: AbortSignal }): Promise<ChainTip>;
}

//
// Checkpoints
//

export interface CheckpointKey {
  chain: ChainId;
  protocol: ProtocolId;
  primaryEndpoint: string;
  secondaryEndpoint: string;
}

export interface Checkpoint extends CheckpointKey {
  lastReconciledHeight: number;
  // FETCH_FAILED heights accepted under gap tolerance
  unverifiedHeights: number[];
  updatedAt: string; // ISO 8601
}

export interface CheckpointStore {
  load(key: CheckpointKey): Promise<Checkpoint | undefined>;
  save(checkpoint: Checkpoint): Promise<void>;
  close(): Promise<void>;
}

export type KVBufferStore = {
  get(key: string): Promise<Buffer | undefined>;
  set(key: string, buffer: Buffer): Promise<void>;
  del(key: string): Promise<void>;
  has(key: string): Promise<boolean>;
  close(): Promise<void>;
};

//
// Runs
//

export interface RunConfig {
  chain: ChainId;
  protocol: ProtocolId;
  primaryEndpoint: string;
  secondaryEndpoint: string;
  startHeight?: number;
  endHeight?: number;
  threadCount: number;
  tolerateGaps: boolean;
}

export type EngineState =
  | 'IDLE'
  | 'INITIALIZING'
  | 'RESOLVING_RANGE'
  | 'RUNNING'
  | 'COMPLETED'
  | 'CANCELLED'
  | 'FAILED';

export type RunStatus = Extract<
  EngineState,
  'COMPLETED' | 'CANCELLED' | 'FAILED'
>;

export interface HeightRange {
  start: number;
  end: number;
}

export interface RunSummary {
  status: RunStatus;
  chain: ChainId;
  protocol: ProtocolId;
  range?: HeightRange;
  blocksProcessed: number;
  blocksMatched: number;
  blocksDiverged: number;
  unverifiedHeights: number[];
  divergenceCount: number;
  divergencesByKind: Record<DivergenceKind, number>;
  divergencesByBucket: Record<string, number>;
  lastReconciledHeight?: number;
  divergenceFound: boolean;
  verificationComplete: boolean;
  durationMs: number;
  failure?: { name: string; message: string; height?: number };
}

export interface ReportSink {
  writeBlock(result: BlockResult): Promise<void>;
  writeSummary(summary: RunSummary): Promise<void>;
  close(): Promise<void>;
}
