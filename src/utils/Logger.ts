import winston from 'winston';

/**
 * Create the agent logger. Everything goes to stderr because stdout carries
 * the report. Each `-v` lowers the level and adds detail to the line format.
 */
export function createLogger(verbosity: number = 0): winston.Logger {
  const threshold = verbosity >= 2 ? 'debug' : verbosity === 1 ? 'info' : 'warn';

  const line = winston.format.printf((info) => {
    const { level, message, label, timestamp, ...meta } = info;
    const parts = [level.toUpperCase()];
    if (verbosity >= 2 && typeof timestamp === 'string') {
      parts.push(timestamp);
    }
    if (verbosity >= 1 && typeof label === 'string') {
      parts.push(label);
    }
    parts.push(String(message));
    const text = parts.join(': ');
    return verbosity >= 3 && Object.keys(meta).length > 0 ? `${text} ${JSON.stringify(meta)}` : text;
  });

  return winston.createLogger({
    level: threshold,
    format: winston.format.combine(
      winston.format.label({ label: 'k8s-special-agent' }),
      winston.format.timestamp(),
      line,
    ),
    transports: [
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
      }),
    ],
  });
}
