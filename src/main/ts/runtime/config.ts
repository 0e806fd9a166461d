import type { DiagnosticReporter } from "../common/diagnostics.js";
import { ErrorCode, throwError } from "./errors.js";

export interface HookNames {
  // Consulted by `read` once direct and class-side lookup both miss.
  missHook: string;
  // Every `write` is routed through this class-side hook.
  writeHook: string;
}

export interface RuntimeOptions {
  baseClassName?: string;
  metaclassName?: string;
  missHook?: string;
  writeHook?: string;
  reporter?: DiagnosticReporter;
}

export interface ResolvedRuntimeOptions extends HookNames {
  baseClassName: string;
  metaclassName: string;
  reporter?: DiagnosticReporter;
}

export const DEFAULT_OPTIONS = {
  baseClassName: "object",
  metaclassName: "type",
  missHook: "__getattr__",
  writeHook: "__setattr__",
} as const;

function requireName(option: string, value: string): string {
  if (value.trim() === "") {
    throwError(ErrorCode.INVALID_OPTION, { option, reason: "must not be empty" });
  }
  return value;
}

export function resolveOptions(
  options: RuntimeOptions = {}
): ResolvedRuntimeOptions {
  const resolved: ResolvedRuntimeOptions = {
    baseClassName: requireName(
      "baseClassName",
      options.baseClassName ?? DEFAULT_OPTIONS.baseClassName
    ),
    metaclassName: requireName(
      "metaclassName",
      options.metaclassName ?? DEFAULT_OPTIONS.metaclassName
    ),
    missHook: requireName("missHook", options.missHook ?? DEFAULT_OPTIONS.missHook),
    writeHook: requireName(
      "writeHook",
      options.writeHook ?? DEFAULT_OPTIONS.writeHook
    ),
    reporter: options.reporter,
  };

  if (resolved.missHook === resolved.writeHook) {
    throwError(ErrorCode.INVALID_OPTION, {
      option: "writeHook",
      reason: `same name as missHook ('${resolved.missHook}')`,
    });
  }
  if (resolved.baseClassName === resolved.metaclassName) {
    throwError(ErrorCode.INVALID_OPTION, {
      option: "metaclassName",
      reason: `same name as baseClassName ('${resolved.baseClassName}')`,
    });
  }

  return resolved;
}
