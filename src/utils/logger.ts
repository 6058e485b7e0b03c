import pino, { type Logger } from 'pino';

// One stderr stream shared by every logger configureLogger builds
const stderr = pino.destination(2);

let logger: Logger = pino({ level: process.env.HITL_LOG_LEVEL ?? 'info' }, stderr);

export function configureLogger(opts: { level?: string; format?: string }): void {
  const level = opts.level ?? 'info';
  logger = opts.format === 'pretty'
    ? pino({ level, transport: { target: 'pino-pretty', options: { destination: 2 } } })
    : pino({ level }, stderr);
}

export function getLogger(name?: string): Logger {
  return name ? logger.child({ component: name }) : logger;
}
