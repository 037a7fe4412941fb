import pino from 'pino';
import pretty from 'pino-pretty';
import chalk from 'chalk';

// --- Color Helper ---
const moduleColors: Record<string, chalk.Chalk> = {
  'System': chalk.magenta.bold,
  'CLI': chalk.yellow.bold,
  'Web': chalk.blue.bold,
  'RAG': chalk.hex('#FFA500').bold, // Orange
  'LLM': chalk.hex('#8A2BE2').bold, // BlueViolet
  'Knowledge': chalk.cyan.bold,
  'Config': chalk.gray.bold,
};

const getColor = (moduleName: string): chalk.Chalk => {
  // Sub-modules (e.g. Knowledge:SQLite) share the parent colour
  const baseModule = moduleName.split(':')[0];
  if (moduleColors[baseModule]) return moduleColors[baseModule];

  // Hash to pick a consistent color
  const colors = [chalk.red, chalk.green, chalk.yellow, chalk.blue, chalk.magenta, chalk.cyan];
  let hash = 0;
  for (let i = 0; i < moduleName.length; i++) {
    hash = moduleName.charCodeAt(i) + ((hash << 5) - hash);
  }
  return colors[Math.abs(hash) % colors.length].bold;
};

// Logs go to stderr; stdout carries the chat transcript.
const prettyStream = pretty({
  colorize: true,
  destination: 2,
  translateTime: 'SYS:standard',
  ignore: 'pid,hostname,module',
  messageFormat: (log, messageKey) => {
    const msg = log[messageKey];
    const text = typeof msg === 'string' ? msg : JSON.stringify(msg);
    const moduleName = log.module;

    if (typeof moduleName === 'string' && moduleName) {
      return `${getColor(moduleName)(`[${moduleName}]`)} ${text}`;
    }
    return text;
  },
});

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

const logger = pino(
  {
    level: defaultLevel(),
    base: { pid: false },
  },
  prettyStream
);

export default logger;
