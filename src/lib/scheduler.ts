/**
 * Build scheduler.
 *
 * Selects the entries of a collation to build, prunes those the manifest
 * reports as fresh and dispatches the rest to a renderer, either one at a
 * time or across a fixed pool of async workers sharing one queue.
 *
 * Error policy:
 * - sequential: stop at the first error
 * - parallel, fail-fast: settle with the first error; workers take no new
 *   files but files already dispatched run to completion detached
 * - parallel, aggregate: every dispatched file finishes, then a
 *   BuildErrors carrying every failure is thrown
 */

import * as path from "node:path";
import { BuildErrors } from "./errors.js";
import { Manifest } from "./manifest.js";
import { BuildTarget } from "./models.js";
import { RenderOutcome } from "./renderer.js";

export interface TargetRenderer {
  render(target: BuildTarget): Promise<RenderOutcome>;
}

export interface ScheduleOptions {
  /** Worker count; 1 runs sequentially */
  jobs: number;
  failFast: boolean;
  force: boolean;
  /** Limit the pass to these directories or files */
  scope?: string[];
  manifest?: Manifest;
  /** Called after each file is built */
  onBuilt?: (target: BuildTarget, outcome: RenderOutcome) => void;
}

export interface ScheduleResult {
  /** Files dispatched to the renderer */
  dispatched: number;
  /** Files pruned as fresh */
  fresh: number;
  outcomes: Map<string, RenderOutcome>;
}

/**
 * Whether `source` is one of, or inside one of, the scope paths.
 */
export function inScope(source: string, scope: string[] | undefined): boolean {
  if (!scope || scope.length === 0) return true;
  return scope.some((entry) => {
    const rel = path.relative(entry, source);
    return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
  });
}

/**
 * Entries to build after scope selection and manifest pruning.
 */
export function selectTargets(
  targets: BuildTarget[],
  options: Pick<ScheduleOptions, "scope" | "manifest" | "force">,
): { selected: BuildTarget[]; fresh: number } {
  const selected: BuildTarget[] = [];
  let fresh = 0;
  for (const target of targets) {
    if (target.resource.operation === "noop") continue;
    if (!inScope(target.source, options.scope)) continue;
    if (
      options.manifest &&
      !options.manifest.isDirty(target.source, target.destination, options.force)
    ) {
      fresh++;
      continue;
    }
    selected.push(target);
  }
  return { selected, fresh };
}

export class Scheduler {
  constructor(
    private readonly renderer: TargetRenderer,
    private readonly options: ScheduleOptions,
  ) {}

  async run(targets: BuildTarget[]): Promise<ScheduleResult> {
    const { selected, fresh } = selectTargets(targets, this.options);
    const outcomes = new Map<string, RenderOutcome>();

    if (this.options.jobs <= 1) {
      for (const target of selected) {
        await this.dispatch(target, outcomes);
      }
    } else {
      await this.runPool(selected, outcomes);
    }

    return { dispatched: selected.length, fresh, outcomes };
  }

  private async dispatch(
    target: BuildTarget,
    outcomes: Map<string, RenderOutcome>,
  ): Promise<void> {
    const outcome = await this.renderer.render(target);
    this.options.manifest?.touch(target.source);
    outcomes.set(target.source, outcome);
    this.options.onBuilt?.(target, outcome);
  }

  private runPool(
    queue: BuildTarget[],
    outcomes: Map<string, RenderOutcome>,
  ): Promise<void> {
    const { failFast } = this.options;
    const workers = Math.min(this.options.jobs, queue.length);
    const errors: Error[] = [];
    let next = 0;
    let aborted = false;

    return new Promise<void>((resolve, reject) => {
      let running = workers;
      if (running === 0) {
        resolve();
        return;
      }

      const finish = (): void => {
        running--;
        if (running > 0 || aborted) return;
        if (errors.length > 0) {
          reject(new BuildErrors(errors));
        } else {
          resolve();
        }
      };

      const work = async (): Promise<void> => {
        while (!aborted && next < queue.length) {
          const target = queue[next++];
          try {
            await this.dispatch(target, outcomes);
          } catch (err) {
            const error = err instanceof Error ? err : new Error(String(err));
            if (failFast) {
              if (!aborted) {
                aborted = true;
                reject(error);
              }
              return;
            }
            errors.push(error);
          }
        }
      };

      for (let i = 0; i < workers; i++) {
        void work().then(finish);
      }
    });
  }
}
