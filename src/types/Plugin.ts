import type { StagedChange } from "./StagedChange";

/**
 * Plugin interface for extending repository behavior with side effects.
 *
 * @remarks
 * Plugins execute **after** a commit has been applied by the adapter:
 *
 * - **After Commit**: only run when `commitChanges` resolved and the batch
 *   was not empty
 * - **Parallel Execution**: all plugins run concurrently via Promise.allSettled
 * - **Isolated Failures**: one plugin failure doesn't affect others
 * - **Non-Blocking**: the commit stands regardless of plugin outcomes
 *
 * Use `onPluginError` in the repository options to observe failures.
 *
 * @example
 * ```typescript
 * const auditPlugin: Plugin = {
 *   async onCommitted({ changes }) {
 *     for (const change of changes) {
 *       await auditLog.record(change.type, change.entityName, change.entityId);
 *     }
 *   },
 * };
 * ```
 */
export type Plugin = {
  /**
   * Hook called after staged changes are committed.
   *
   * @param args.changes - The committed changes, in staging order
   */
  onCommitted?: (args: {
    changes: readonly StagedChange[];
  }) => void | Promise<void>;
};
