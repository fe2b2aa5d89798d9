/**
 * Request Outcome Types
 */

import type { SessionMetricsSummary } from './metrics.types';
import type { StreamFault } from '../utils/faults';

export type RequestStatus = 'completed' | 'cancelled' | 'failed' | 'rejected' | 'disconnected';

export type CancelReason = 'client' | 'disconnect' | 'idle_timeout' | 'shutdown';

export interface RequestOutcome {
  requestId: string;
  status: RequestStatus;
  summary?: SessionMetricsSummary;
  error?: StreamFault;
}
