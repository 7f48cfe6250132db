import type { ErrorDetail } from '../errors.js';
import { createLogger } from './logger.js';

const log = createLogger('diagnostics');

export type DiagLevel = 'WARN' | 'ERROR' | 'INFO';

export type DiagMeta = ErrorDetail;

export function formatDiagnostic(level: DiagLevel, component: string, message: string, meta?: DiagMeta): string {
  const parts: string[] = [];
  parts.push(`[${level}]`);
  parts.push(`[${component || 'unknown'}]`);
  parts.push(message);
  const fields: string[] = [];
  if (meta) {
    if (meta.file) fields.push(`file=${meta.file}`);
    if (typeof meta.row === 'number') fields.push(`row=${meta.row}`);
    if (meta.column) fields.push(`column=${meta.column}`);
    if (meta.section) fields.push(`section=${meta.section}`);
    if (typeof meta.treadle === 'number') fields.push(`treadle=${meta.treadle}`);
    if (typeof meta.shaft === 'number') fields.push(`shaft=${meta.shaft}`);
  }
  if (fields.length) parts.push(fields.join(', '));
  return parts.join(' ');
}

export function warn(component: string, message: string, meta?: DiagMeta): void {
  log.warn(formatDiagnostic('WARN', component, message, meta));
}

export function error(component: string, message: string, meta?: DiagMeta): void {
  log.error(formatDiagnostic('ERROR', component, message, meta));
}

export default { formatDiagnostic, warn, error };
