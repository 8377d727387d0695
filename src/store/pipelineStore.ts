/**
 * Pipeline Status Store - observable state of one AttitudePipeline.
 * Consumers subscribe for status changes and counters. The pipeline writes
 * one snapshot per chunk; an unchanged snapshot does not notify.
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import type { PipelineErrorKind } from "../lib/errors";

export type PipelineStatus = "idle" | "running" | "stopped" | "disconnected";

export interface PipelineCounters {
  bytesReceived: number;
  records: number;
  published: number;
  overwritten: number;
  errors: Record<PipelineErrorKind, number>;
}

export interface PipelineThroughput {
  bytesPerSecond: number;
  recordsPerSecond: number;
}

export interface PipelineSnapshot {
  counters: PipelineCounters;
  /** Measured over the last completed statistics window */
  throughput: PipelineThroughput;
  /** Published / decoded-or-rejected records, 0..1 */
  successRate: number;
  resetCount: number;
  calibrating: boolean;
  calibrationProgress: number;
  /** Gyro bias, deg/s */
  bias: { x: number; y: number; z: number };
  lastError: string | null;
}

export interface PipelineState extends PipelineSnapshot {
  status: PipelineStatus;

  // Actions
  setStatus: (status: PipelineStatus) => void;
  applySnapshot: (snapshot: PipelineSnapshot) => void;
  clear: () => void;
}

const ERROR_KINDS: readonly PipelineErrorKind[] = [
  "InsufficientData",
  "MalformedRecord",
  "ChecksumMismatch",
  "InvalidQuaternion",
  "SensorDisconnected",
];

function emptyErrors(): Record<PipelineErrorKind, number> {
  return {
    InsufficientData: 0,
    MalformedRecord: 0,
    ChecksumMismatch: 0,
    InvalidQuaternion: 0,
    SensorDisconnected: 0,
  };
}

function initialSnapshot(): PipelineSnapshot {
  return {
    counters: {
      bytesReceived: 0,
      records: 0,
      published: 0,
      overwritten: 0,
      errors: emptyErrors(),
    },
    throughput: { bytesPerSecond: 0, recordsPerSecond: 0 },
    successRate: 0,
    resetCount: 0,
    calibrating: false,
    calibrationProgress: 0,
    bias: { x: 0, y: 0, z: 0 },
    lastError: null,
  };
}

function sameCounters(a: PipelineCounters, b: PipelineCounters): boolean {
  return (
    a.bytesReceived === b.bytesReceived &&
    a.records === b.records &&
    a.published === b.published &&
    a.overwritten === b.overwritten &&
    ERROR_KINDS.every((kind) => a.errors[kind] === b.errors[kind])
  );
}

export function sameSnapshot(a: PipelineSnapshot, b: PipelineSnapshot): boolean {
  return (
    sameCounters(a.counters, b.counters) &&
    a.throughput.bytesPerSecond === b.throughput.bytesPerSecond &&
    a.throughput.recordsPerSecond === b.throughput.recordsPerSecond &&
    a.successRate === b.successRate &&
    a.resetCount === b.resetCount &&
    a.calibrating === b.calibrating &&
    a.calibrationProgress === b.calibrationProgress &&
    a.bias.x === b.bias.x &&
    a.bias.y === b.bias.y &&
    a.bias.z === b.bias.z &&
    a.lastError === b.lastError
  );
}

export type PipelineStore = StoreApi<PipelineState>;

/** One store per pipeline; there is no shared singleton. */
export function createPipelineStore(): PipelineStore {
  return createStore<PipelineState>()((set, get) => ({
    status: "idle",
    ...initialSnapshot(),

    setStatus: (status) => {
      if (get().status !== status) set({ status });
    },

    applySnapshot: (snapshot) => {
      if (!sameSnapshot(get(), snapshot)) set(snapshot);
    },

    clear: () => set({ status: "idle", ...initialSnapshot() }),
  }));
}
