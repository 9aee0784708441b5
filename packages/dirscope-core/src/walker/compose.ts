import type { DirectoryEvent, EntryEvent, TreeVisitor, TruncationEvent } from './types.js';

/**
 * Fan every event out to several visitors, in the order given, so one
 * walk can feed a renderer and a collector at once.
 */
export function composeVisitors(...visitors: TreeVisitor[]): TreeVisitor {
  return {
    enterDirectory(event: DirectoryEvent): void {
      visitors.forEach((visitor) => visitor.enterDirectory?.(event));
    },
    visitEntry(event: EntryEvent): void {
      visitors.forEach((visitor) => visitor.visitEntry?.(event));
    },
    leaveDirectory(event: DirectoryEvent): void {
      visitors.forEach((visitor) => visitor.leaveDirectory?.(event));
    },
    truncated(event: TruncationEvent): void {
      visitors.forEach((visitor) => visitor.truncated?.(event));
    },
  };
}
