import { createHash } from 'crypto';

export const normalizeEntityText = (text: string): string => text.trim().replace(/\s+/g, ' ').toLowerCase();

export const entityKey = (type: string, text: string): string =>
  `${type.trim().toUpperCase()}:${normalizeEntityText(text)}`;

/**
 * Content-addressed entity identifier: the same type and normalized text
 * always give the same id, whichever document or wave produced it.
 */
export const entityId = (type: string, text: string): string =>
  createHash('sha256').update(entityKey(type, text)).digest('hex').slice(0, 16);
