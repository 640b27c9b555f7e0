import { z } from 'zod';

// --- Logging Types ---

export const LogTypeSchema = z.enum(['SYSTEM', 'ADD', 'REMOVE', 'CLEAR', 'EVICT', 'INVOKE']);
export type LogType = z.infer<typeof LogTypeSchema>;

export interface LogMetadata {
  count?: number;
  called?: number;
  evicted?: number;
  observers?: number;

  // Allow additional structured fields without `any`
  [key: string]: unknown;
}

export interface LogEntry {
  id: string;
  timestamp: string;
  type: LogType;
  delegate?: string; // label of the delegate the entry is about
  content: string;
  metadata?: LogMetadata;
}

// --- Configuration Types ---

export const RemoveMatchingSchema = z.enum(['shape', 'reference']);

export const DelegateConfigSchema = z.object({
  // Print log entries to the console (DELEGATE_TRACE=1 does the same).
  trace: z.boolean().default(false),
  // Only print these entry types; all of them when omitted.
  trace_types: z.array(LogTypeSchema).optional(),
  // How `remove(callable)` identifies callables for delegates built without an explicit option.
  remove_matching: RemoveMatchingSchema.default('shape'),
});
export type DelegateConfig = z.infer<typeof DelegateConfigSchema>;
