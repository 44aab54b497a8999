/**
 * @fileoverview Engine registry
 *
 * Maps engine names to implementations. The orchestrator resolves kernels and
 * runs notebooks through a registry so that callers can plug in their own
 * engines without touching the execution path.
 */

import type { Notebook } from '../notebook/types.js';
import { EngineError } from '../core/errors.js';
import { logInfo } from '../telemetry/logger.js';
import { NodeEngine } from './node_engine.js';
import { SUBPROCESS_ENGINE_NAME, SubprocessEngine } from './subprocess_engine.js';
import type { Engine, EngineExecuteOptions } from './types.js';

export const DEFAULT_ENGINE_NAME = SUBPROCESS_ENGINE_NAME;

export class EngineRegistry {
  private engines = new Map<string, Engine>();

  constructor(readonly defaultEngineName: string = DEFAULT_ENGINE_NAME) {}

  /** Replaces any engine already registered under the same name. */
  register(engine: Engine): void {
    this.engines.set(engine.name, engine);
  }

  unregister(name: string): void {
    this.engines.delete(name);
  }

  has(name: string): boolean {
    return this.engines.has(name);
  }

  list(): string[] {
    return Array.from(this.engines.keys());
  }

  /**
   * @throws EngineError when nothing is registered under the name
   */
  get(name?: string | null): Engine {
    const key = name ?? this.defaultEngineName;
    const engine = this.engines.get(key);
    if (!engine) {
      const available = this.list().join(', ') || 'none';
      throw new EngineError(key, 'unknown_engine', false, `No engine registered under '${key}' (available: ${available})`);
    }
    return engine;
  }

  resolveKernelName(engineName: string | null | undefined, notebook: Notebook, kernelName?: string | null): string {
    return this.get(engineName).resolveKernelName(notebook, kernelName);
  }

  async executeNotebookWithEngine(
    engineName: string | null | undefined,
    notebook: Notebook,
    options: EngineExecuteOptions,
  ): Promise<Notebook> {
    const engine = this.get(engineName);
    logInfo(`Executing notebook with kernel: ${options.kernelName}`, { engine: engine.name });
    return engine.execute(notebook, options);
  }
}

export function createDefaultEngineRegistry(defaultEngineName?: string): EngineRegistry {
  const registry = new EngineRegistry(defaultEngineName);
  registry.register(new SubprocessEngine());
  registry.register(new NodeEngine());
  return registry;
}

export const engineRegistry = createDefaultEngineRegistry();
