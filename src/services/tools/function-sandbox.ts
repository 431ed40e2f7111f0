// Function Sandbox
// Runs caller-supplied JavaScript in a worker thread with V8 heap limits, inside a vm context
// that has only ECMAScript built-ins and no string code generation. The worker is terminated
// when the wall-clock deadline passes.

import { Worker } from 'worker_threads';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';

const log = logger.child({ module: 'function-sandbox' });

export interface SandboxLimits {
  timeoutMs: number;
  memoryMb: number;
}

export interface SandboxRun {
  source: string;
  entry: string;
  params: Record<string, unknown>;
}

// Evaluated as a CommonJS script by the worker; everything caller-controlled stays a string
// until it is parsed inside the isolated context.
const WORKER_SOURCE = `
const { parentPort, workerData } = require('node:worker_threads');
const vm = require('node:vm');

const { source, entry, paramsJson, timeoutMs } = workerData;

function fail(error) {
  parentPort.postMessage({ ok: false, error: error && error.message ? String(error.message) : String(error) });
}

try {
  const context = vm.createContext({}, {
    name: 'tool-function',
    codeGeneration: { strings: false, wasm: false },
  });
  context.__paramsJson = paramsJson;
  context.__entryName = entry;

  new vm.Script(
    'delete globalThis.WebAssembly; delete globalThis.SharedArrayBuffer; delete globalThis.Atomics;' +
    'var __params = JSON.parse(__paramsJson);' +
    'var __reserved = Object.keys(globalThis);' +
    'Object.assign(globalThis, __params);' +
    '__reserved = __reserved.concat(Object.keys(__params));',
    { filename: 'prelude.js' },
  ).runInContext(context, { timeout: timeoutMs });

  new vm.Script(source, { filename: 'tool-function.js' }).runInContext(context, { timeout: timeoutMs });

  const value = new vm.Script(
    'var __fn = typeof globalThis[__entryName] === "function" ? globalThis[__entryName] : undefined;' +
    'if (!__fn) {' +
    '  var __name = Object.keys(globalThis).find(function (k) {' +
    '    return __reserved.indexOf(k) === -1 && k.charAt(0) !== "_" && typeof globalThis[k] === "function";' +
    '  });' +
    '  __fn = __name === undefined ? undefined : globalThis[__name];' +
    '}' +
    'if (!__fn) { throw new Error("No callable function found in the provided code"); }' +
    '__fn(__params);',
    { filename: 'entry.js' },
  ).runInContext(context, { timeout: timeoutMs });

  Promise.resolve(value).then(
    (resolved) => {
      context.__value = resolved;
      const json = new vm.Script('JSON.stringify(__value)', { filename: 'result.js' })
        .runInContext(context, { timeout: timeoutMs });
      parentPort.postMessage({ ok: true, result: json === undefined ? null : JSON.parse(json) });
    },
    fail,
  ).catch(fail);
} catch (error) {
  fail(error);
}
`;

const SandboxMessageSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), result: z.unknown() }),
  z.object({ ok: z.literal(false), error: z.string() }),
]);

/**
 * Executes `run.entry` (or the first top-level function) from `run.source`.
 * Parameters are exposed as globals and passed as the first argument.
 * Resolves with the JSON-compatible return value.
 */
export function runInSandbox(run: SandboxRun, limits: SandboxLimits): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let settled = false;

    const worker = new Worker(WORKER_SOURCE, {
      eval: true,
      env: {},
      stdout: true,
      stderr: true,
      workerData: {
        source: run.source,
        entry: run.entry,
        paramsJson: JSON.stringify(run.params),
        timeoutMs: limits.timeoutMs,
      },
      resourceLimits: {
        maxOldGenerationSizeMb: limits.memoryMb,
        maxYoungGenerationSizeMb: Math.max(4, Math.floor(limits.memoryMb / 4)),
        stackSizeMb: 4,
      },
    });

    const settle = (outcome: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(deadline);
      outcome();
      worker.terminate().catch((error: unknown) => {
        log.warn({ err: error }, 'Failed to terminate sandbox worker');
      });
    };

    // Startup of the worker is not covered by the vm timeout
    const deadline = setTimeout(() => {
      settle(() => reject(new Error(`Function execution timed out after ${limits.timeoutMs}ms`)));
    }, limits.timeoutMs + 1000);

    worker.once('message', (message: unknown) => {
      const parsed = SandboxMessageSchema.safeParse(message);
      if (!parsed.success) {
        settle(() => reject(new Error('Sandbox returned a malformed message')));
        return;
      }
      const data = parsed.data;
      if (data.ok) {
        settle(() => resolve(data.result));
      } else {
        settle(() => reject(new Error(data.error)));
      }
    });

    worker.once('error', (error: Error) => {
      settle(() => reject(new Error(`Sandbox worker failed: ${error.message}`)));
    });

    worker.once('exit', (code: number) => {
      settle(() => reject(new Error(`Sandbox worker exited with code ${code}`)));
    });
  });
}
