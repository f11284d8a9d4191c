/**
 * CloudWatch Logs tailing (FilterLogEvents), printed the way `aws logs tail` prints
 */

import { setTimeout as sleep } from 'node:timers/promises';
import {
  FilterLogEventsCommand,
  type CloudWatchLogsClient,
  type FilteredLogEvent,
} from '@aws-sdk/client-cloudwatch-logs';
import type { Logger } from 'pino';
import { Success, type Result } from '@/types';
import { DEFAULT_TIMEOUTS, LOG_TAIL_DEFAULTS } from '@/config/constants';
import { awsFailure } from './failure';

export interface LogLine {
  eventId: string;
  timestamp: number;
  stream: string;
  message: string;
}

export interface TailOptions {
  /** Keep polling for new events until `signal` aborts */
  follow?: boolean;
  /** Start of the window, in epoch milliseconds */
  sinceMs?: number;
  /** Most recent events to print before following */
  limit?: number;
  pollIntervalMs?: number;
  signal?: AbortSignal;
}

export interface LogTailer {
  /** Stream events to `onLine`; returns the number of lines delivered */
  tail: (
    logGroup: string,
    options: TailOptions,
    onLine: (line: LogLine) => void,
  ) => Promise<Result<number>>;
}

/**
 * `<ISO timestamp> <stream> <message>`
 */
export function formatLogLine(line: LogLine): string {
  return `${new Date(line.timestamp).toISOString()} ${line.stream} ${line.message.trimEnd()}`;
}

function toLogLine(event: FilteredLogEvent): LogLine {
  return {
    eventId: event.eventId ?? `${event.logStreamName ?? ''}:${event.timestamp ?? 0}`,
    timestamp: event.timestamp ?? 0,
    stream: event.logStreamName ?? '',
    message: event.message ?? '',
  };
}

/**
 * Wait out the poll interval; resolves false once `signal` aborts
 */
async function waitForNextPoll(ms: number, signal?: AbortSignal): Promise<boolean> {
  try {
    await sleep(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal?.aborted) return false;
    throw error;
  }
}

export function createLogTailer(client: CloudWatchLogsClient, logger: Logger): LogTailer {
  const fetchSince = async (logGroup: string, startTime: number): Promise<LogLine[]> => {
    const lines: LogLine[] = [];
    let nextToken: string | undefined;

    do {
      const response = await client.send(
        new FilterLogEventsCommand({
          logGroupName: logGroup,
          startTime,
          ...(nextToken ? { nextToken } : {}),
        }),
      );
      lines.push(...(response.events ?? []).map(toLogLine));
      nextToken = response.nextToken;
    } while (nextToken);

    return lines.sort((a, b) => a.timestamp - b.timestamp);
  };

  return {
    async tail(logGroup, options, onLine): Promise<Result<number>> {
      const limit = options.limit ?? LOG_TAIL_DEFAULTS.limit;
      const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_TIMEOUTS.logPoll;
      let startTime = options.sinceMs ?? Date.now() - LOG_TAIL_DEFAULTS.sinceMinutes * 60_000;
      // Queries start at `startTime` inclusively, so only ids printed at that instant can repeat
      let boundaryIds = new Set<string>();
      let delivered = 0;

      const deliver = (line: LogLine): void => {
        if (line.timestamp < startTime) return;
        if (line.timestamp === startTime && boundaryIds.has(line.eventId)) return;
        if (line.timestamp > startTime) {
          startTime = line.timestamp;
          boundaryIds = new Set();
        }
        boundaryIds.add(line.eventId);
        onLine(line);
        delivered++;
      };

      logger.debug({ logGroup, startTime, follow: options.follow ?? false }, 'Tailing log group');

      try {
        const initial = await fetchSince(logGroup, startTime);
        initial.slice(-limit).forEach(deliver);

        while (options.follow && !options.signal?.aborted) {
          if (!(await waitForNextPoll(pollIntervalMs, options.signal))) break;
          (await fetchSince(logGroup, startTime)).forEach(deliver);
        }
      } catch (error) {
        return awsFailure(logger, `Failed to read log group ${logGroup}`, error, { logGroup });
      }

      return Success(delivered);
    },
  };
}
