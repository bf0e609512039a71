import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { existsSync } from 'node:fs';
import { logger } from './utils/logger.js';
import { table } from './utils/formatting.js';
import { getConfigFile, getStudyId, loadConfig, type EventLoggerConfig } from './config.js';
import { EventLogger } from './event-logger.js';
import { CsvEventLog, readLogFile } from './storage/csv-log.js';
import { resolveLogFilePath, validateProjectId } from './log-file.js';
import { runTerminalSession } from './terminal.js';
import { closeServer, createApp, startServer } from './server/app.js';
import type { EventRecord } from './types.js';

interface SessionOptions {
  outputDir?: string;
  dateFolder: boolean;
  recordStart?: boolean;
}

interface ServeOptions extends SessionOptions {
  host?: string;
  port?: number;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

function parseProjectId(value: string | undefined): string | null {
  if (!value) return null;
  try {
    return validateProjectId(value);
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
}

function openSession(config: EventLoggerConfig, projectId: string | null, options: SessionOptions): EventLogger {
  const logPath = resolveLogFilePath(
    {
      outputDir: options.outputDir ?? config.outputDir,
      useDateFolder: options.dateFolder && config.useDateFolder,
      projectId: projectId ?? undefined,
    },
    new Date(),
  );

  const eventLogger = new EventLogger({
    store: new CsvEventLog(logPath),
    eventTypes: config.eventTypes,
  });

  logger.success(`Logging events to ${logPath}`);
  if (projectId) {
    logger.keyValue('Project', `${projectId} (${getStudyId(config, projectId)})`);
  }
  if (options.recordStart ?? config.recordSessionStart) {
    eventLogger.recordSessionStart();
  }
  return eventLogger;
}

/** Logs whatever is still open when the process is asked to stop. */
function closeSession(eventLogger: EventLogger): void {
  if (eventLogger.status().sessionStartedAt) {
    eventLogger.endSession({ abortActive: true, notes: 'logger stopped' });
  } else if (eventLogger.activeEvent) {
    eventLogger.abortEvent('logger stopped');
  }
}

function addSessionOptions(command: Command): Command {
  return command
    .option('-o, --output-dir <dir>', 'Directory for event logs (default: config outputDir or cwd)')
    .option('--no-date-folder', 'Write the log directly into the output directory')
    .option('--record-start', 'Write a SESSION START row when the session opens');
}

export function createCli(): Command {
  const program = new Command();

  program
    .name('event-logger')
    .description('Mark the start and stop of observation-session events and log them to CSV')
    .version('1.0.0');

  // serve command
  addSessionOptions(
    program
      .command('serve')
      .description('Serve the event buttons over HTTP')
      .argument('[project-id]', 'Project identifier used to prefix the log file name')
      .option('-p, --port <port>', 'Port to listen on', parsePort)
      .option('-H, --host <host>', 'Host to bind'),
  ).action(async (rawProjectId: string | undefined, options: ServeOptions) => {
    const config = loadConfig();
    const projectId = parseProjectId(rawProjectId);

    let eventLogger: EventLogger;
    try {
      eventLogger = openSession(config, projectId, options);
    } catch (err) {
      logger.error(`Failed to open log: ${err instanceof Error ? err.message : err}`);
      process.exit(1);
    }

    const host = options.host ?? config.server.host;
    const port = options.port ?? config.server.port;
    const server = await startServer(createApp(eventLogger, { projectId }), host, port);
    logger.success(`Listening on http://${host === '0.0.0.0' ? 'localhost' : host}:${port}`);

    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}, shutting down`);
      let exitCode = 0;
      try {
        closeSession(eventLogger);
      } catch (err) {
        logger.error(`Failed to log the open event: ${err instanceof Error ? err.message : err}`);
        exitCode = 1;
      }
      closeServer(server)
        .catch(err => {
          logger.error(`Failed to close server: ${err}`);
          exitCode = 1;
        })
        .finally(() => process.exit(exitCode));
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  });

  // run command
  addSessionOptions(
    program
      .command('run', { isDefault: true })
      .description('Log events from an interactive terminal menu')
      .argument('[project-id]', 'Project identifier used to prefix the log file name'),
  ).action(async (rawProjectId: string | undefined, options: SessionOptions) => {
    const config = loadConfig();
    const projectId = parseProjectId(rawProjectId);

    try {
      const eventLogger = openSession(config, projectId, options);
      await runTerminalSession(eventLogger, {
        projectId,
        studyId: projectId ? getStudyId(config, projectId) : null,
      });
    } catch (err) {
      logger.error(`${err instanceof Error ? err.message : err}`);
      process.exit(1);
    }
  });

  // show command
  program
    .command('show')
    .description('Print the rows of an event log')
    .argument('<file>', 'CSV log file')
    .action((file: string) => {
      if (!existsSync(file)) {
        logger.error(`No such file: ${file}`);
        process.exit(1);
      }

      let records: EventRecord[];
      try {
        records = readLogFile(file);
      } catch (err) {
        logger.error(`${err instanceof Error ? err.message : err}`);
        process.exit(1);
      }

      if (records.length === 0) {
        logger.info('No events logged yet');
        return;
      }

      logger.heading(`Events in ${file}`);
      console.log('');
      console.log(table(
        ['Event', 'Start', 'End', 'Notes'],
        records.map(r => [
          r.eventType,
          `${r.startDate} ${r.startTime}`,
          `${r.endDate} ${r.endTime}`,
          r.notes || chalk.dim('—'),
        ]),
      ));
      console.log('');
    });

  // events command
  program
    .command('events')
    .description('List the configured event categories')
    .action(() => {
      const config = loadConfig();
      logger.heading('Event Categories');
      config.eventTypes.forEach((name, i) => console.log(`  ${chalk.dim(String(i + 1).padStart(2))}  ${name}`));
    });

  // config command
  program
    .command('config')
    .description('Show the effective configuration')
    .action(() => {
      const config = loadConfig();
      logger.heading('Configuration');
      logger.keyValue('File', getConfigFile());
      logger.keyValue('Output dir', config.outputDir ?? process.cwd());
      logger.keyValue('Date folder', config.useDateFolder ? 'yes' : 'no');
      logger.keyValue('Record session start', config.recordSessionStart ? 'yes' : 'no');
      logger.keyValue('Server', `${config.server.host}:${config.server.port}`);
      logger.keyValue('Event categories', String(config.eventTypes.length));
      const studies = Object.entries(config.studyIds);
      if (studies.length > 0) {
        logger.keyValue('Study ids', studies.map(([prefix, id]) => `${prefix} → ${id}`).join(', '));
      }
    });

  return program;
}
