/**
 * @fileoverview Claude Code hooks configuration generator
 *
 * Generates the `hooks` section of `.claude/settings.local.json` so that every TodoWrite is
 * validated (PostToolUse) and a SPEC run cannot stop with pending tasks (Stop). Both hooks
 * invoke this package's CLI, which reads the event from stdin.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

import { DEFAULT_HOOK_COMMAND, HOOK_TIMEOUT_SECONDS, TODO_TOOL_NAME } from './config/guard-config.js';
import { writeJsonAtomic } from './utils/atomic-json.js';

export interface HookCommand {
  type: 'command';
  command: string;
  timeout: number;
}

export interface HookMatcher {
  matcher?: string;
  hooks: HookCommand[];
}

export interface HooksConfig {
  hooks: {
    PostToolUse: HookMatcher[];
    Stop: HookMatcher[];
  };
}

const SettingsSchema = z.record(z.unknown());
const HooksSectionSchema = z.record(z.unknown());

/**
 * Generates the hooks section for .claude/settings.local.json
 *
 * @param command How the CLI is invoked from the project, e.g. `npx spec-guard`
 */
export function generateHooksConfig(command: string = DEFAULT_HOOK_COMMAND): HooksConfig {
  const hook = (subcommand: string): HookCommand => ({
    type: 'command',
    command: `${command} hook ${subcommand}`,
    timeout: HOOK_TIMEOUT_SECONDS,
  });

  return {
    hooks: {
      PostToolUse: [{ matcher: TODO_TOOL_NAME, hooks: [hook('validate')] }],
      Stop: [{ hooks: [hook('stop')] }],
    },
  };
}

/**
 * Writes hooks config to .claude/settings.local.json in the given project.
 * Other settings and other hook events are kept; PostToolUse and Stop are replaced.
 *
 * @returns Path of the settings file
 */
export function writeHooksConfig(projectDir: string, command: string = DEFAULT_HOOK_COMMAND): string {
  const settingsPath = join(projectDir, '.claude', 'settings.local.json');
  let existing: Record<string, unknown> = {};

  if (existsSync(settingsPath)) {
    try {
      const parsed = SettingsSchema.safeParse(JSON.parse(readFileSync(settingsPath, 'utf-8')));
      existing = parsed.success ? parsed.data : {};
    } catch {
      // Malformed settings are replaced
      existing = {};
    }
  }

  const existingHooks = HooksSectionSchema.safeParse(existing.hooks);
  const generated = generateHooksConfig(command);
  const merged = {
    ...existing,
    hooks: { ...(existingHooks.success ? existingHooks.data : {}), ...generated.hooks },
  };

  writeJsonAtomic(settingsPath, merged);
  return settingsPath;
}
