import fs from 'fs';
import path from 'path';
import { getLogDir } from './logger.js';

/**
 * RunLogger - one log file per agent run.
 * Records the run lifecycle: input, visited nodes, events and the outcome.
 */
export class RunLogger {
  private logsDir: string;
  private logStreams: Map<string, fs.WriteStream> = new Map();

  constructor(logsDir: string = getLogDir()) {
    this.logsDir = logsDir;
    fs.mkdirSync(this.logsDir, { recursive: true });
  }

  private getLogStream(runId: string): fs.WriteStream {
    let stream = this.logStreams.get(runId);
    if (!stream) {
      const logFile = path.join(this.logsDir, `${runId}.log`);
      stream = fs.createWriteStream(logFile, { flags: 'a', encoding: 'utf-8' });
      this.logStreams.set(runId, stream);
    }
    return stream;
  }

  private writeLog(runId: string, event: string, data?: unknown) {
    const stream = this.getLogStream(runId);
    const timestamp = new Date().toISOString();

    let logLine = `[${timestamp}] ${event}`;
    if (data !== undefined) {
      if (typeof data === 'string' || typeof data === 'number') {
        logLine += `: ${data}`;
      } else {
        logLine += `:\n${JSON.stringify(data, null, 2)}`;
      }
    }
    logLine += '\n';

    stream.write(logLine);
  }

  logRunStarted(runId: string, agentId: string, input: string, metadata?: Record<string, unknown>) {
    this.writeLog(runId, '='.repeat(80));
    this.writeLog(runId, `RUN STARTED - ${agentId.toUpperCase()}`);
    this.writeLog(runId, '='.repeat(80));
    this.writeLog(runId, 'Run ID', runId);
    this.writeLog(runId, 'Input Length', `${input.length} chars`);
    this.writeLog(runId, 'Input', input);
    if (metadata) {
      this.writeLog(runId, 'Metadata', metadata);
    }
  }

  logNode(runId: string, node: string, step: number) {
    this.writeLog(runId, `NODE ${step}: ${node}`);
  }

  logEvent(runId: string, event: string, data?: unknown) {
    this.writeLog(runId, event, data);
  }

  /**
   * Resolves once the run's file has been flushed and closed.
   */
  logRunCompleted(runId: string, summary: Record<string, unknown>): Promise<void> {
    this.writeLog(runId, '='.repeat(80));
    this.writeLog(runId, 'RUN COMPLETED');
    this.writeLog(runId, '='.repeat(80));
    this.writeLog(runId, 'Summary', summary);
    return this.closeStream(runId);
  }

  logRunFailed(runId: string, error: string): Promise<void> {
    this.writeLog(runId, '='.repeat(80));
    this.writeLog(runId, 'RUN FAILED');
    this.writeLog(runId, '='.repeat(80));
    this.writeLog(runId, 'Error', error);
    return this.closeStream(runId);
  }

  private closeStream(runId: string): Promise<void> {
    const stream = this.logStreams.get(runId);
    if (!stream) {
      return Promise.resolve();
    }
    this.logStreams.delete(runId);
    return new Promise(resolve => {
      stream.end(() => resolve());
    });
  }

  closeAll() {
    for (const stream of this.logStreams.values()) {
      stream.end();
    }
    this.logStreams.clear();
  }

  readRunLog(runId: string): string | null {
    const logFile = path.join(this.logsDir, `${runId}.log`);
    if (fs.existsSync(logFile)) {
      return fs.readFileSync(logFile, 'utf-8');
    }
    return null;
  }
}

let globalRunLogger: RunLogger | null = null;

export function getRunLogger(): RunLogger {
  if (!globalRunLogger) {
    globalRunLogger = new RunLogger();
  }
  return globalRunLogger;
}

export function closeRunLogger() {
  if (globalRunLogger) {
    globalRunLogger.closeAll();
    globalRunLogger = null;
  }
}
