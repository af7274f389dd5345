export class CycleSearchBudgetExceededError extends Error {
    constructor(budget: number) {
        super(`Cycle search exceeded ${budget} expansions`);
        this.name = 'CycleSearchBudgetExceededError';
    }
}

/**
 * Directed account graph. Parallel transfers between the same pair of
 * accounts collapse into one edge whose weight is the summed amount.
 */
export class DirectedGraph {
    private outgoing = new Map<string, Map<string, number>>();
    private incoming = new Map<string, Set<string>>();

    addNode(node: string): void {
        if (!this.outgoing.has(node)) {
            this.outgoing.set(node, new Map());
            this.incoming.set(node, new Set());
        }
    }

    addEdge(source: string, destination: string, weight: number = 0): void {
        this.addNode(source);
        this.addNode(destination);

        const targets = this.outgoing.get(source);
        const sources = this.incoming.get(destination);
        if (!targets || !sources) {
            return;
        }

        targets.set(destination, (targets.get(destination) ?? 0) + weight);
        sources.add(source);
    }

    hasNode(node: string): boolean {
        return this.outgoing.has(node);
    }

    nodes(): string[] {
        return [...this.outgoing.keys()];
    }

    successors(node: string): string[] {
        return [...(this.outgoing.get(node)?.keys() ?? [])];
    }

    edgeWeight(source: string, destination: string): number | undefined {
        return this.outgoing.get(source)?.get(destination);
    }

    numberOfNodes(): number {
        return this.outgoing.size;
    }

    numberOfEdges(): number {
        let count = 0;
        for (const targets of this.outgoing.values()) {
            count += targets.size;
        }
        return count;
    }

    /** In-degree plus out-degree; a self-loop contributes to both. */
    degree(node: string): number {
        return (this.outgoing.get(node)?.size ?? 0) + (this.incoming.get(node)?.size ?? 0);
    }

    /**
     * Degree normalised by the n - 1 other nodes. Directed graphs can score
     * above 1. A single-node graph scores 1.
     */
    degreeCentrality(): Map<string, number> {
        const centrality = new Map<string, number>();
        const n = this.numberOfNodes();

        if (n <= 1) {
            for (const node of this.outgoing.keys()) {
                centrality.set(node, 1);
            }
            return centrality;
        }

        for (const node of this.outgoing.keys()) {
            centrality.set(node, this.degree(node) / (n - 1));
        }
        return centrality;
    }

    numberOfWeaklyConnectedComponents(): number {
        const seen = new Set<string>();
        let components = 0;

        for (const start of this.outgoing.keys()) {
            if (seen.has(start)) {
                continue;
            }
            components++;
            seen.add(start);
            const stack = [start];

            while (stack.length > 0) {
                const node = stack.pop();
                if (node === undefined) {
                    break;
                }
                const neighbours = [
                    ...(this.outgoing.get(node)?.keys() ?? []),
                    ...(this.incoming.get(node) ?? []),
                ];
                for (const next of neighbours) {
                    if (!seen.has(next)) {
                        seen.add(next);
                        stack.push(next);
                    }
                }
            }
        }

        return components;
    }

    /**
     * Counts the simple cycles that pass through `node`. Every such cycle is
     * found once, as the path that leaves `node` and first returns to it.
     * Throws CycleSearchBudgetExceededError once `budget` edge expansions
     * have been spent.
     */
    countCyclesThrough(node: string, budget: number): number {
        if (!this.hasNode(node)) {
            return 0;
        }

        let expansions = 0;
        let cycles = 0;
        const onPath = new Set<string>([node]);

        const walk = (current: string): void => {
            for (const next of this.outgoing.get(current)?.keys() ?? []) {
                expansions++;
                if (expansions > budget) {
                    throw new CycleSearchBudgetExceededError(budget);
                }

                if (next === node) {
                    cycles++;
                } else if (!onPath.has(next)) {
                    onPath.add(next);
                    walk(next);
                    onPath.delete(next);
                }
            }
        };

        walk(node);
        return cycles;
    }
}
