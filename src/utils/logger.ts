import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors, splat } = winston.format;

type LevelName = 'error' | 'warn' | 'info' | 'http' | 'debug';

interface LevelStyle {
  color: chalk.Chalk;
  bright: chalk.Chalk;
  icon: string;
}

const LEVEL_STYLES: Record<LevelName, LevelStyle> = {
  error: { color: chalk.red, bright: chalk.redBright, icon: '❌' },
  warn: { color: chalk.yellow, bright: chalk.yellowBright, icon: '⚠️ ' },
  info: { color: chalk.blue, bright: chalk.blueBright, icon: 'ℹ️ ' },
  http: { color: chalk.magenta, bright: chalk.magentaBright, icon: '🌐' },
  debug: { color: chalk.cyan, bright: chalk.cyanBright, icon: '🔍' },
};

const FALLBACK_STYLE: LevelStyle = { color: chalk.white, bright: chalk.whiteBright, icon: '📝' };

const isLevelName = (level: string): level is LevelName => level in LEVEL_STYLES;

const styleFor = (level: string): LevelStyle => (isLevelName(level) ? LEVEL_STYLES[level] : FALLBACK_STYLE);

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';

// Console output: colored level tag, document context when present
const consoleFormat = printf(({ level, message, timestamp: ts, stack, document }) => {
  const style = styleFor(level);
  const head = `${chalk.gray(`[${String(ts)}]`)} ${style.icon} ${style.color(`[${level.toUpperCase()}]`)}`;
  const context = typeof document === 'string' ? ` ${chalk.gray(`(${document})`)}` : '';

  if (typeof stack === 'string') {
    return `${head}${context}\n${chalk.red(stack)}`;
  }

  const text = typeof message === 'string' ? style.bright(message) : String(message);
  return `${head}${context} ${text}`;
});

// File output: no colors
const fileFormat = printf(({ level, message, timestamp: ts, stack, document }) => {
  const context = typeof document === 'string' ? ` (${document})` : '';
  const body = typeof stack === 'string' ? stack : String(message);
  return `${String(ts)} [${level.toUpperCase()}]${context}: ${body}`;
});

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: combine(timestamp({ format: TIMESTAMP_FORMAT }), errors({ stack: true }), splat()),
  defaultMeta: { service: 'invoice-detail-extractor' },
  transports: [
    new winston.transports.Console({
      format: combine(timestamp({ format: TIMESTAMP_FORMAT }), errors({ stack: true }), consoleFormat),
    }),
  ],
});

if (env.NODE_ENV === 'production') {
  const fileTransportFormat = combine(
    timestamp({ format: TIMESTAMP_FORMAT }),
    errors({ stack: true }),
    fileFormat
  );

  logger.add(
    new winston.transports.File({ filename: 'logs/error.log', level: 'error', format: fileTransportFormat })
  );
  logger.add(new winston.transports.File({ filename: 'logs/extraction.log', format: fileTransportFormat }));
}

const toMessage = (args: unknown): string =>
  typeof args === 'string' ? args : JSON.stringify(args, null, 2);

/**
 * Static helpers that accept any value and log it as a string.
 */
export class Logging {
  public static info = (args: unknown): void => {
    logger.info(toMessage(args));
  };

  public static warn = (args: unknown): void => {
    logger.warn(toMessage(args));
  };

  public static error = (args: unknown): void => {
    logger.error(toMessage(args));
  };

  public static debug = (args: unknown): void => {
    logger.debug(toMessage(args));
  };

  // Pretty formatted success message
  public static success = (args: unknown): void => {
    if (env.NODE_ENV === 'test') return;
    const ts = new Date().toISOString().replace('T', ' ').substring(0, 19);
    // eslint-disable-next-line no-console
    console.log(chalk.gray(`[${ts}]`), '✅', chalk.green('[SUCCESS]'), chalk.greenBright(toMessage(args)));
  };

  // Box-styled banner for startup
  public static box = (title: string, message: string): void => {
    const line = '═'.repeat(50);
    const rows = [
      chalk.cyan(`╔${line}╗`),
      chalk.cyan('║') + chalk.bold.cyanBright(` ${title.padEnd(49)}`) + chalk.cyan('║'),
      chalk.cyan(`╠${line}╣`),
      chalk.cyan('║') + chalk.white(` ${message.padEnd(49)}`) + chalk.cyan('║'),
      chalk.cyan(`╚${line}╝`),
    ];
    // eslint-disable-next-line no-console
    console.log(rows.join('\n'));
  };
}

export default logger;
