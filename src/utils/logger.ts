import path from 'path';
import winston from 'winston';
import Transport from 'winston-transport';

const LOG_LEVEL = process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'test' ? 'error' : 'info');
const LOG_DIR = process.env.LOG_DIR;
const AUDIT_TRAIL_SIZE = 500;

export interface AuditEntry {
  level: string;
  message: string;
  timestamp: string;
}

/**
 * Keeps the most recent critical lines in memory so operators can ask the
 * engine what happened without shipping files around.
 */
export class AuditTrailTransport extends Transport {
  private readonly entries: AuditEntry[] = [];
  private readonly capacity: number;

  constructor(opts: Transport.TransportStreamOptions & { capacity?: number } = {}) {
    super(opts);
    this.capacity = opts.capacity ?? AUDIT_TRAIL_SIZE;
  }

  log(info: { level: string; message: unknown }, callback: () => void) {
    setImmediate(() => {
      this.emit('logged', info);
    });

    const level = info.level;
    const message = String(info.message);

    const isCritical =
      level === 'error' ||
      level === 'warn' ||
      message.includes('LIQUIDATED') ||
      message.includes('RESET') ||
      message.includes('CLOSE-ALL');

    if (isCritical) {
      this.entries.push({ level, message, timestamp: new Date().toISOString() });
      if (this.entries.length > this.capacity) {
        this.entries.splice(0, this.entries.length - this.capacity);
      }
    }

    callback();
  }

  snapshot(): AuditEntry[] {
    return this.entries.slice();
  }

  clear(): void {
    this.entries.length = 0;
  }
}

const auditTrail = new AuditTrailTransport({ level: 'debug' });

const transports: winston.transport[] = [
  new winston.transports.Console({
    level: LOG_LEVEL,
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    ),
  }),
  auditTrail,
];

if (LOG_DIR) {
  transports.push(new winston.transports.File({ filename: path.join(LOG_DIR, 'error.log'), level: 'error' }));
  transports.push(new winston.transports.File({ filename: path.join(LOG_DIR, 'combined.log'), level: LOG_LEVEL }));
}

const logger = winston.createLogger({
  level: 'debug',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports,
});

export function getAuditTrail(): AuditEntry[] {
  return auditTrail.snapshot();
}

export function clearAuditTrail(): void {
  auditTrail.clear();
}

export default logger;
