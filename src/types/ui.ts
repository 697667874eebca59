// src/types/ui.ts
import type { EventKind } from './event.ts';

// Central label map for banners used across emitters and tests
export const LABEL: Record<EventKind, string> = {
  print: 'PRINT',
  warn: 'WARNING',
  error: 'ERROR',
  assert: 'ASSERTION',
  checkpoint: 'CHECKPOINT',
};
