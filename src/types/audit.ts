/**
 * Audit trail types for the column cascading engine
 */

import { ActorType } from './common.js';

/**
 * Represents an entry in the audit log
 */
export interface AuditEntry {
  id: string;
  timestamp: Date;
  actor: string;
  actorType: ActorType;
  action: string;
  entityType: string;
  entityId: string;
  previousState?: unknown;
  newState?: unknown;
  rationale?: string;
}

/**
 * Parameters for creating an audit entry
 */
export interface CreateAuditEntryParams {
  actor: string;
  actorType: ActorType;
  action: string;
  entityType: string;
  entityId: string;
  previousState?: unknown;
  newState?: unknown;
  rationale?: string;
}
