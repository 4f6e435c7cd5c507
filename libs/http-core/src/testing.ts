import type { HttpHeaders, HttpTransport, Logger, LoggerMeta, RawHttpResponse, Scheduler, TransportRequest } from './types';

const textEncoder = new TextEncoder();

export function rawResponse(status: number, body: unknown = undefined, headers: HttpHeaders = {}): RawHttpResponse {
  const text = body === undefined ? '' : typeof body === 'string' ? body : JSON.stringify(body);
  return { status, headers, body: textEncoder.encode(text) };
}

export type FakeReply = RawHttpResponse | Error | ((request: TransportRequest, signal: AbortSignal) => Promise<RawHttpResponse>);

export interface FakeTransport {
  transport: HttpTransport;
  requests: TransportRequest[];
}

/**
 * In-process transport that answers with the queued replies in order and
 * records every request it receives. Running out of replies is a test bug.
 */
export function createFakeTransport(replies: FakeReply[]): FakeTransport {
  const queue = [...replies];
  const requests: TransportRequest[] = [];
  const transport: HttpTransport = async (request, signal) => {
    requests.push(request);
    const reply = queue.shift();
    if (reply === undefined) {
      throw new Error(`Unexpected request: ${request.method} ${request.url}`);
    }
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'function') return reply(request, signal);
    return reply;
  };
  return { transport, requests };
}

export interface RecordingScheduler extends Scheduler {
  delays: number[];
}

/** Scheduler that records the requested delays and resolves immediately. */
export function createRecordingScheduler(): RecordingScheduler {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms, signal) => {
      delays.push(ms);
      if (signal?.aborted) {
        throw new DOMException('The operation was aborted', 'AbortError');
      }
    },
  };
}

export interface LogLine {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  meta?: LoggerMeta;
}

export interface CapturingLogger extends Logger {
  lines: LogLine[];
  /** Every line serialized, for scanning. */
  dump(): string;
}

export function createCapturingLogger(): CapturingLogger {
  const lines: LogLine[] = [];
  const push = (level: LogLine['level']) => (message: string, meta?: LoggerMeta) => {
    lines.push({ level, message, meta });
  };
  return {
    lines,
    debug: push('debug'),
    info: push('info'),
    warn: push('warn'),
    error: push('error'),
    dump: () => lines.map((line) => `${line.level} ${line.message} ${JSON.stringify(line.meta ?? {})}`).join('\n'),
  };
}
