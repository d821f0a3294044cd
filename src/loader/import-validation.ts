/**
 * policy-wasm — Import validation
 *
 * Validates that a policy module only imports what the runtime provides:
 * `env.memory`, `env.opa_abort`, `env.opa_println` and the builtin
 * dispatchers. Rejects modules that import WASI interfaces, undeclared
 * functions, or unexpected namespaces.
 */

import type { ModuleImportDescriptor, Result } from '../types.js';
import type { PolicyError } from '../errors.js';
import { invalidModule } from '../errors.js';
import { HOST_FUNCTION_NAMES } from '../host/host-imports.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** WASI module namespaces that must be rejected. */
const BLOCKED_NAMESPACES: readonly string[] = [
  'wasi_snapshot_preview1',
  'wasi_unstable',
  'wasi',
];

/** The only namespace the runtime populates. */
const HOST_NAMESPACE = 'env';

// ---------------------------------------------------------------------------
// Import Report
// ---------------------------------------------------------------------------

/** Report of all imports found during validation. */
export interface ImportReport {
  /** All imports declared by the module. */
  readonly imports: readonly ModuleImportDescriptor[];
  /** Whether the module imports `env.memory`. */
  readonly importsMemory: boolean;
  /** Host functions the module imports, in declaration order. */
  readonly hostFunctions: readonly string[];
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Validate all imports declared by a policy module.
 *
 * @returns ImportReport on success, INVALID_MODULE on the first offending import.
 */
export function validateModuleImports(
  imports: readonly ModuleImportDescriptor[],
): Result<ImportReport, PolicyError> {
  let importsMemory = false;
  const hostFunctions: string[] = [];

  for (const imp of imports) {
    if (BLOCKED_NAMESPACES.includes(imp.module)) {
      return {
        ok: false,
        error: invalidModule(
          `module imports from blocked namespace '${imp.module}' (import: '${imp.name}'). ` +
            `WASI interfaces are not available to policy modules.`,
        ),
      };
    }

    if (imp.module !== HOST_NAMESPACE) {
      return {
        ok: false,
        error: invalidModule(
          `module imports from undeclared namespace '${imp.module}' (import: '${imp.name}'). ` +
            `Only the '${HOST_NAMESPACE}' namespace is supported.`,
        ),
      };
    }

    if (imp.name === 'memory') {
      if (imp.kind !== 'memory') {
        return {
          ok: false,
          error: invalidModule(`'env.memory' must be imported as memory, not ${imp.kind}`),
        };
      }
      importsMemory = true;
      continue;
    }

    if (imp.kind === 'function' && HOST_FUNCTION_NAMES.includes(imp.name)) {
      hostFunctions.push(imp.name);
      continue;
    }

    return {
      ok: false,
      error: invalidModule(
        `module imports undeclared ${imp.kind} 'env.${imp.name}'. ` +
          `Only memory, opa_abort, opa_println and opa_builtin0-4 are provided.`,
      ),
    };
  }

  return { ok: true, value: { imports, importsMemory, hostFunctions } };
}
