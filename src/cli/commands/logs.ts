import { InvalidArgumentError, type Command } from 'commander';
import { COMPONENTS, LOG_GROUPS, LOG_TAIL_DEFAULTS, type Component } from '@/config/constants';
import { formatLogLine } from '@/infra/aws/log-tailer';
import { handleResultError, handleUsageError } from '../error-formatting';
import { openSession, type CliDependencies } from '../dependencies';
import { CLI_NAME } from './component-argument';

function isComponent(value: string): value is Component {
  return COMPONENTS.some((component) => component === value);
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function registerLogsCommand(program: Command, deps: CliDependencies): void {
  program
    .command('logs')
    .description('Print recent service logs, optionally following new events')
    .argument('<component>', 'frontend or backend')
    .option('-f, --follow', 'keep polling for new events until interrupted')
    .option(
      '--since <minutes>',
      `how far back to start (default: ${LOG_TAIL_DEFAULTS.sinceMinutes})`,
      parsePositiveInt,
    )
    .action(async (component: string, options: { follow?: boolean; since?: number }) => {
      if (!isComponent(component)) {
        handleUsageError(
          `${CLI_NAME} logs <frontend|backend> [--follow] [--since <minutes>]`,
          `Unknown component: ${component}`,
        );
      }

      const session = openSession(program, deps);
      const tailer = deps.createLogTailer(session.config, session.logger);
      const sinceMinutes = options.since ?? LOG_TAIL_DEFAULTS.sinceMinutes;

      const controller = new AbortController();
      const stop = (): void => controller.abort();
      process.once('SIGINT', stop);

      try {
        const result = await tailer.tail(
          LOG_GROUPS[component],
          {
            follow: options.follow ?? false,
            sinceMs: Date.now() - sinceMinutes * 60_000,
            signal: controller.signal,
          },
          (line) => console.log(formatLogLine(line)),
        );
        if (!result.ok) handleResultError(result, `Failed to read ${component} logs`);
      } finally {
        process.removeListener('SIGINT', stop);
      }
    });
}
