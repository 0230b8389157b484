import type { BackendError } from '../errors';
import type { QngCrossOp } from './types';

type Correlation = { correlationId: string };

export type CrossEvent =
  | ({ type: 'onSubmitting'; op: QngCrossOp; ts: number } & Correlation)
  | ({ type: 'onSubmitted'; op: QngCrossOp; txHash: string; ts: number } & Correlation)
  | ({ type: 'onFailed'; op: QngCrossOp; error: BackendError; ts: number } & Correlation);

export type CrossListener = (e: CrossEvent) => void;
