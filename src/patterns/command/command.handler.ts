import { Injectable, Logger } from '@nestjs/common';
import { AuditAction, Command, CommandAuditEntry, CommandResult } from './command.interface';
import { MetricsService } from '../../infrastructure/metrics/metrics.service';
import { delay } from '../../common/utils/delay.util';
import { errorMessage } from '../../common/utils/pattern-response.util';

export const MAX_ATTEMPTS = 3;
const BACKOFF_STEP_MS = 100;

/**
 * Runs commands with retry and keeps an append-only audit trail.
 * Queued commands are held in FIFO order; nothing drains the queue.
 */
@Injectable()
export class CommandHandler {
  private readonly logger = new Logger(CommandHandler.name);
  private readonly pending: Command[] = [];
  private readonly auditLog: CommandAuditEntry[] = [];

  constructor(private readonly metrics: MetricsService) {}

  /**
   * Up to MAX_ATTEMPTS tries with a linear backoff of retryCount x 100ms between them.
   * Never throws for a failing command: the last failure is returned as a result.
   */
  async execute(command: Command, signal?: AbortSignal): Promise<CommandResult> {
    const startedAt = Date.now();
    let retryCount = 0;
    let lastResult: CommandResult = { success: false, errorMessage: 'Max retries exceeded' };

    while (retryCount < MAX_ATTEMPTS) {
      try {
        this.audit(command, 'EXECUTE', retryCount);
        lastResult = await command.execute(signal);

        if (lastResult.success) {
          this.audit(command, 'SUCCESS', retryCount, Date.now() - startedAt);
          this.metrics.incrementCounter('command.execute.count', { outcome: 'success' });
          return lastResult;
        }

        retryCount++;
        if (retryCount >= MAX_ATTEMPTS) {
          this.audit(command, 'FAILED', retryCount);
          this.metrics.incrementCounter('command.execute.count', { outcome: 'failed' });
          return lastResult;
        }
        this.logger.warn(`Command ${command.commandId} failed, retrying (${retryCount}/${MAX_ATTEMPTS})`);
      } catch (error) {
        retryCount++;
        this.logger.error(
          `Command ${command.commandId} threw exception (retry ${retryCount}/${MAX_ATTEMPTS}): ${errorMessage(error)}`,
        );
        if (retryCount >= MAX_ATTEMPTS) {
          this.audit(command, 'EXCEPTION', retryCount);
          this.metrics.incrementCounter('command.execute.count', { outcome: 'exception' });
          return { success: false, errorMessage: errorMessage(error) };
        }
      }

      await delay(BACKOFF_STEP_MS * retryCount, signal);
    }

    return lastResult;
  }

  async queue(command: Command): Promise<void> {
    this.pending.push(command);
    this.audit(command, 'QUEUED', 0);
    this.metrics.setGauge('command.queue.size', this.pending.length);
    this.logger.log(`Command ${command.commandId} queued`);
  }

  getAuditLog(): CommandAuditEntry[] {
    return [...this.auditLog];
  }

  getQueueCount(): number {
    return this.pending.length;
  }

  getQueuedCommandIds(): string[] {
    return this.pending.map(c => c.commandId);
  }

  private audit(command: Command, action: AuditAction, retryCount: number, durationMs?: number): void {
    const entry: CommandAuditEntry = { commandId: command.commandId, action, timestamp: new Date(), retryCount };
    this.auditLog.push(durationMs === undefined ? entry : { ...entry, durationMs });
  }
}
