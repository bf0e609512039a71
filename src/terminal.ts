import inquirer from 'inquirer';
import chalk from 'chalk';
import { EventLoggerError } from './errors.js';
import { parseClockTime, type EventLogger } from './event-logger.js';
import { box, formatDuration, formatLogTime } from './utils/formatting.js';
import { logger } from './utils/logger.js';

export interface TerminalContext {
  projectId: string | null;
  studyId: string | null;
}

const ABORT = '__abort__';
const MISSING = '__missing__';
const END = '__end__';

type EndChoice = 'abort' | 'discard' | 'cancel';

function printHeader(eventLogger: EventLogger, ctx: TerminalContext): void {
  const lines = [
    `${chalk.dim('Log file:')} ${chalk.white(eventLogger.logFile)}`,
  ];
  if (ctx.projectId) {
    lines.unshift(`${chalk.dim('Project:')}  ${chalk.white(ctx.projectId)}${ctx.studyId ? chalk.dim(` (${ctx.studyId})`) : ''}`);
  }
  console.log('');
  console.log(box(lines.join('\n'), 'Event Logger'));
  console.log('');
}

function describeActive(eventLogger: EventLogger): string {
  const status = eventLogger.status();
  if (!status.activeEvent || !status.startedAt) {
    return chalk.dim('Press a button to start an event');
  }
  const started = new Date(status.startedAt);
  return `${chalk.cyan.bold(status.activeEvent)} ${chalk.dim(`since ${formatLogTime(started)} (${formatDuration(Date.now() - started.getTime())})`)}`;
}

/**
 * Reports a domain error and carries on; anything unexpected propagates.
 */
export function reportError(eventLogger: EventLogger, err: unknown): void {
  if (!(err instanceof EventLoggerError)) throw err;
  if (err.code === 'WRITE_FAILURE') {
    const active = eventLogger.activeEvent;
    logger.error(active ? `${err.message}. ${active} is still active, try again.` : err.message);
  } else {
    logger.warn(err.message);
  }
}

async function promptNotes(message: string): Promise<string> {
  const { notes } = await inquirer.prompt<{ notes: string }>([
    {
      type: 'input',
      name: 'notes',
      message,
    },
  ]);
  return notes.trim();
}

async function toggle(eventLogger: EventLogger, eventName: string): Promise<void> {
  // Notes belong to the event being closed, so only ask when one is.
  const active = eventLogger.activeEvent;
  const notes = active ? await promptNotes(`Notes for ${active} (optional):`) : '';
  const result = eventLogger.toggleEvent(eventName, notes);
  logger.success(result.status);
  logger.bell();
}

async function abort(eventLogger: EventLogger): Promise<void> {
  if (!eventLogger.activeEvent) {
    logger.warn('No active event to abort');
    return;
  }
  const notes = await promptNotes('Abort notes (optional):');
  const result = eventLogger.abortEvent(notes);
  logger.warn(result.status);
  logger.bell();
}

async function addMissing(eventLogger: EventLogger): Promise<void> {
  const validateTime = (input: string) => {
    try {
      parseClockTime(input, new Date());
      return true;
    } catch {
      return 'Enter a time as HH:MM:SS';
    }
  };

  const answers = await inquirer.prompt<{ eventType: string; startTime: string; endTime: string; notes: string }>([
    {
      type: 'list',
      name: 'eventType',
      message: 'Select event:',
      choices: eventLogger.listEventTypes(),
    },
    {
      type: 'input',
      name: 'startTime',
      message: 'Start time (HH:MM:SS):',
      default: formatLogTime(new Date()),
      validate: validateTime,
    },
    {
      type: 'input',
      name: 'endTime',
      message: 'End time (HH:MM:SS):',
      default: formatLogTime(new Date()),
      validate: validateTime,
    },
    {
      type: 'input',
      name: 'notes',
      message: 'Notes (optional):',
    },
  ]);

  const result = eventLogger.addMissingEvent(answers);
  logger.success(result.status);
  logger.bell();
}

async function confirmEnd(eventLogger: EventLogger): Promise<EndChoice> {
  if (!eventLogger.activeEvent) return 'discard';

  const { choice } = await inquirer.prompt<{ choice: EndChoice }>([
    {
      type: 'list',
      name: 'choice',
      message: `${eventLogger.activeEvent} is still active. Abort it before ending the session?`,
      choices: [
        { name: 'Yes, abort and log it', value: 'abort' },
        { name: 'No, end without logging it', value: 'discard' },
        { name: 'Cancel', value: 'cancel' },
      ],
    },
  ]);
  return choice;
}

/**
 * Interactive menu loop. Returns once the operator ends the session.
 */
export async function runTerminalSession(eventLogger: EventLogger, ctx: TerminalContext): Promise<void> {
  printHeader(eventLogger, ctx);

  for (;;) {
    console.log(`  ${describeActive(eventLogger)}\n`);

    const active = eventLogger.activeEvent;
    const eventChoices = eventLogger.listEventTypes().map(name => ({
      name: name === active ? chalk.cyan(`■ ${name} (stop)`) : `  ${name}`,
      value: name,
    }));

    const { action } = await inquirer.prompt<{ action: string }>([
      {
        type: 'list',
        name: 'action',
        message: 'Select an event',
        pageSize: eventChoices.length + 5,
        choices: [
          ...eventChoices,
          new inquirer.Separator(),
          { name: chalk.red('  Abort current event'), value: ABORT },
          { name: '  Add missing event', value: MISSING },
          { name: chalk.dim('  End session'), value: END },
        ],
      },
    ]);

    try {
      if (action === END) {
        const choice = await confirmEnd(eventLogger);
        if (choice === 'cancel') continue;
        const { durationMs } = eventLogger.endSession({ abortActive: choice === 'abort' });
        logger.success(durationMs === null ? 'Session ended' : `Session ended after ${formatDuration(durationMs)}`);
        logger.dim(`Events saved to ${eventLogger.logFile}`);
        return;
      }
      if (action === ABORT) {
        await abort(eventLogger);
      } else if (action === MISSING) {
        await addMissing(eventLogger);
      } else {
        await toggle(eventLogger, action);
      }
    } catch (err) {
      reportError(eventLogger, err);
    }
  }
}
