import { ReasoningEngine, EngineCapabilities } from './interface.js';
import { createEngineNotFoundError } from '../types/errors.js';
import { createDPLLEngine } from './dpll/index.js';
import { createMiniSatEngine } from './minisat.js';

export interface EngineEntry {
    factory: () => ReasoningEngine;
    capabilities: EngineCapabilities;
}

const REGISTRY: ReadonlyMap<string, EngineEntry> = new Map<string, EngineEntry>([
    ['dpll', {
        factory: createDPLLEngine,
        capabilities: { heuristics: true, trace: true, streaming: true },
    }],
    ['minisat', {
        factory: createMiniSatEngine,
        capabilities: { heuristics: false, trace: false, streaming: false },
    }],
]);

/**
 * Names of all registered engines.
 */
export function listEngines(): string[] {
    return Array.from(REGISTRY.keys());
}

export function getEngineCapabilities(name: string): EngineCapabilities | undefined {
    return REGISTRY.get(name)?.capabilities;
}

/**
 * Create a fresh engine by name.
 * @throws LogicException with code ENGINE_NOT_FOUND for unknown names
 */
export function createEngine(name: string): ReasoningEngine {
    const entry = REGISTRY.get(name);
    if (!entry) {
        throw createEngineNotFoundError(name, listEngines());
    }
    return entry.factory();
}
