// src/types/sinks.ts

export type Sinks = {
  /** Plain console output (print). */
  info: (text: string) => void;
  /** Warning channel. The host only reports when `flag` is false. */
  warning: (flag: boolean, text: string) => void;
  /** Error channel (error, failed assert). */
  error: (text: string) => void;
  /** Diagnostic messages (checkpoint). */
  diagnostic: (text: string) => void;
};
