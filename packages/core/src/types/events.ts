// packages/core/src/types/events.ts - Events emitted while executing a plan

import type { ExecutionMode } from './execution.js';

interface BaseEvent {
  timestamp: string;
}

export interface BackupCreatedEvent extends BaseEvent {
  type: 'backup.created';
  backupPath: string;
  filesCopied: number;
}

export interface StepStartedEvent extends BaseEvent {
  type: 'step.started';
  stepId: number;
  file: string;
  mode: ExecutionMode;
}

export interface StepCompletedEvent extends BaseEvent {
  type: 'step.completed';
  stepId: number;
  file: string;
  changesApplied: number;
  warnings: number;
}

export interface StepFailedEvent extends BaseEvent {
  type: 'step.failed';
  stepId: number;
  file: string;
  error: string;
}

export interface ChangeSkippedEvent extends BaseEvent {
  type: 'change.skipped';
  stepId: number;
  file: string;
  line: number;
  reason: string;
}

export interface RunCompletedEvent extends BaseEvent {
  type: 'run.completed';
  mode: ExecutionMode;
  completedSteps: number;
  failedSteps: number;
}

export type MigrationEvent =
  | BackupCreatedEvent
  | StepStartedEvent
  | StepCompletedEvent
  | StepFailedEvent
  | ChangeSkippedEvent
  | RunCompletedEvent;
