/**
 * Analysis stream wire format
 *
 * The backend streams one server-sent-event frame per event:
 * `data: {"event":"<type>","data":"<text>"}` followed by a blank line.
 */

import { z } from 'zod';

export const ANALYSIS_EVENT_TYPES = [
  'status',
  'chunk',
  'tool_use',
  'tool_result',
  'done',
  'error',
] as const;

export type AnalysisEventType = (typeof ANALYSIS_EVENT_TYPES)[number];

export interface AnalysisEvent {
  /** One of ANALYSIS_EVENT_TYPES from a well-behaved backend; passed through as sent */
  event: string;
  data: string;
}

const DATA_PREFIX = 'data: ';

const payloadSchema = z.object({
  event: z.string().catch('chunk'),
  data: z.string().catch(''),
});

export function encodeEvent(event: AnalysisEventType, data: string): string {
  return `${DATA_PREFIX}${JSON.stringify({ event, data })}\n\n`;
}

/**
 * Decode one line of the stream. Lines without the `data: ` prefix carry no
 * event; a payload that is not a JSON object is delivered as a chunk of text.
 */
export function parseEventLine(line: string): AnalysisEvent | undefined {
  if (!line.startsWith(DATA_PREFIX)) {
    return undefined;
  }

  const payload = line.slice(DATA_PREFIX.length);
  let decoded: unknown;
  try {
    decoded = JSON.parse(payload);
  } catch {
    return { event: 'chunk', data: payload };
  }

  const parsed = payloadSchema.safeParse(decoded);
  return parsed.success ? parsed.data : { event: 'chunk', data: payload };
}

/**
 * Accumulates a stream into the final report
 */
export class AnalysisTranscript {
  private readonly chunks: string[] = [];
  private finalReport: string | undefined;
  private failure: string | undefined;
  private finished = false;
  private lastStatus: string | undefined;
  private readonly toolEvents: string[] = [];

  /**
   * Apply one event; returns false once the stream has ended
   */
  apply(event: AnalysisEvent): boolean {
    if (this.finished) return false;

    switch (event.event) {
      case 'status':
        this.lastStatus = event.data;
        break;
      case 'tool_use':
        this.toolEvents.push(event.data);
        break;
      case 'tool_result':
        this.toolEvents.push('Tool completed');
        break;
      case 'chunk':
        this.chunks.push(event.data);
        break;
      case 'done':
        this.finalReport = event.data;
        this.finished = true;
        break;
      case 'error':
        this.failure = event.data;
        this.finished = true;
        break;
      default:
        break;
    }
    return !this.finished;
  }

  /** The `done` payload when non-empty, otherwise the concatenated chunks */
  get report(): string {
    return this.finalReport || this.chunks.join('');
  }

  get error(): string | undefined {
    return this.failure;
  }

  get status(): string | undefined {
    return this.lastStatus;
  }

  get tools(): readonly string[] {
    return this.toolEvents;
  }

  get complete(): boolean {
    return this.finished && this.failure === undefined;
  }
}
