export interface CommandResult {
  success: boolean;
  errorMessage?: string;
  data?: Record<string, unknown>;
}

/** A request captured as an object, so it can be retried, queued, audited and undone. */
export interface Command {
  readonly commandId: string;          // CMD-<hex>
  readonly supportsUndo: boolean;
  execute(signal?: AbortSignal): Promise<CommandResult>;
  undo(signal?: AbortSignal): Promise<CommandResult>;
}

export type AuditAction = 'EXECUTE' | 'SUCCESS' | 'FAILED' | 'EXCEPTION' | 'QUEUED';

export interface CommandAuditEntry {
  commandId: string;
  action: AuditAction;
  timestamp: Date;
  retryCount: number;
  durationMs?: number;   // SUCCESS entries only
}
