// src/types/event.ts

/** The five kinds of event an emitter can report. */
export type EventKind = 'print' | 'warn' | 'error' | 'assert' | 'checkpoint';

/** Which entry point raised a halt. */
export type HaltSource = Extract<EventKind, 'error' | 'assert'>;
