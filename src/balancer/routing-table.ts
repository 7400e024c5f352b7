// ========================================
// Routing Table - immutable snapshot + handle
// ========================================

import type { NodeId, RoutingMode } from '../types.js';

export interface RoutingTable {
    readonly weights: ReadonlyMap<NodeId, number>;
    readonly mode: RoutingMode;
    readonly generatedAt: number;
}

export function createRoutingTable(
    weights: Iterable<readonly [NodeId, number]>,
    mode: RoutingMode,
    generatedAt: number = Date.now()
): RoutingTable {
    return Object.freeze({
        weights: new Map(weights),
        mode,
        generatedAt,
    });
}

/**
 * Every node at the same weight. Used until the first refresh lands.
 */
export function uniformRoutingTable(nodeIds: readonly NodeId[], weight: number, mode: RoutingMode, generatedAt?: number): RoutingTable {
    return createRoutingTable(nodeIds.map((id) => [id, weight] as const), mode, generatedAt);
}

export function usableWeight(table: RoutingTable, nodeId: NodeId): number {
    const weight = table.weights.get(nodeId);
    return weight !== undefined && Number.isFinite(weight) && weight > 0 ? weight : 0;
}

export function totalWeight(table: RoutingTable, nodeIds: readonly NodeId[]): number {
    return nodeIds.reduce((sum, id) => sum + usableWeight(table, id), 0);
}

/**
 * Readers take `current()` once per decision; writers replace the whole table.
 */
export class RoutingTableHandle {
    private table: RoutingTable;
    private generation = 0;

    constructor(initial: RoutingTable) {
        this.table = initial;
    }

    current(): RoutingTable {
        return this.table;
    }

    publish(next: RoutingTable): void {
        this.table = next;
        this.generation++;
    }

    get publishedCount(): number {
        return this.generation;
    }

    toJSON(): { mode: RoutingMode; generatedAt: string; weights: Record<string, number> } {
        const { mode, generatedAt, weights } = this.table;
        return {
            mode,
            generatedAt: new Date(generatedAt).toISOString(),
            weights: Object.fromEntries(Array.from(weights.entries()).map(([id, w]) => [`node-${id}`, w])),
        };
    }
}
