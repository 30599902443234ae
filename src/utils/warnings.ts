/**
 * Non-fatal problems collected during a run and handed back to the caller.
 */

import { WARNING_KINDS } from '../constants/errors';
import type { Logger } from './logger';

export type Ls3WarningKind = typeof WARNING_KINDS[keyof typeof WARNING_KINDS];

export interface Ls3Warning {
  kind: Ls3WarningKind;
  message: string;
  path?: string | undefined;
  context?: Record<string, unknown> | undefined;
}

export class WarningCollector {
  private readonly warnings: Ls3Warning[] = [];

  constructor(private readonly logger?: Logger) { }

  add(kind: Ls3WarningKind, message: string, path?: string, context?: Record<string, unknown>): void {
    this.warnings.push({ kind, message, path, context });
    this.logger?.warn(message, { kind, filePath: path, ...context });
  }

  missingResource(message: string, path: string): void {
    this.add(WARNING_KINDS.MISSING_RESOURCE, message, path);
  }

  skippedFile(message: string, path: string, context?: Record<string, unknown>): void {
    this.add(WARNING_KINDS.SKIPPED_FILE, message, path, context);
  }

  ambiguousAnimation(message: string, context?: Record<string, unknown>): void {
    this.add(WARNING_KINDS.AMBIGUOUS_ANIMATION, message, undefined, context);
  }

  list(): readonly Ls3Warning[] {
    return this.warnings;
  }

  get size(): number {
    return this.warnings.length;
  }
}
