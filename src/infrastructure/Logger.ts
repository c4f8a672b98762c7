import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

// Logs go to stderr so command output on stdout stays clean.
export const logger = process.stderr.isTTY
  ? pino({
      level,
      transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
    })
  : pino({ level }, pino.destination(2));
