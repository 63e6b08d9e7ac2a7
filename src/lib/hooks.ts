/**
 * Build hooks: external commands run before or after a build pass.
 */

import { spawnSync } from "node:child_process";
import { HookConfig, HookPhase } from "./config.js";
import { HookError, toIoError } from "./errors.js";
import { ProfileName } from "./models.js";

export interface HookEnvironment {
  /** Working directory, the project root */
  cwd: string;
  source: string;
  target: string;
  profile: ProfileName;
}

/**
 * Hooks for a phase that apply to the profile, in declaration order.
 */
export function selectHooks(
  hooks: HookConfig[],
  phase: HookPhase,
  profile: ProfileName,
): HookConfig[] {
  return hooks.filter(
    (hook) =>
      hook.phase === phase &&
      (hook.profiles === undefined || hook.profiles.includes(profile)),
  );
}

/**
 * Run hooks one after another. The first failure stops the run.
 */
export function runHooks(
  hooks: HookConfig[],
  phase: HookPhase,
  env: HookEnvironment,
  inherit = true,
): number {
  const selected = selectHooks(hooks, phase, env.profile);
  for (const hook of selected) {
    const result = spawnSync(hook.command, hook.args, {
      cwd: env.cwd,
      stdio: inherit ? "inherit" : "ignore",
      env: {
        ...process.env,
        QUIRE_SOURCE: env.source,
        QUIRE_TARGET: env.target,
        QUIRE_PROFILE: env.profile,
      },
    });
    if (result.error) {
      throw toIoError("run hook", hook.command, result.error);
    }
    if (result.status !== 0) {
      throw new HookError(hook.command, result.status);
    }
  }
  return selected.length;
}
