// packages/core/src/utils/id.ts

import { nanoid } from 'nanoid';

/** Generate a session ID with "ses_" prefix. */
export function generateSessionId(): string {
  return `ses_${nanoid(21)}`;
}
