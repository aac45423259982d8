import { v4 as uuidv4 } from 'uuid';

export function generateDocumentId(): string {
  return `doc-${uuidv4()}`;
}
