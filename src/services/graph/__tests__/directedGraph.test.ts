import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { CycleSearchBudgetExceededError, DirectedGraph } from '../directedGraph';

const graphOf = (edges: Array<[string, string]>): DirectedGraph => {
    const graph = new DirectedGraph();
    for (const [source, destination] of edges) {
        graph.addEdge(source, destination, 100);
    }
    return graph;
};

describe('DirectedGraph', () => {
    it('sums the weights of parallel edges', () => {
        const graph = new DirectedGraph();
        graph.addEdge('A', 'B', 100);
        graph.addEdge('A', 'B', 250);

        assert.equal(graph.numberOfEdges(), 1);
        assert.equal(graph.edgeWeight('A', 'B'), 350);
        assert.equal(graph.edgeWeight('B', 'A'), undefined);
    });

    it('normalises degree centrality by n - 1', () => {
        const centrality = graphOf([['A', 'B'], ['B', 'C']]).degreeCentrality();

        assert.equal(centrality.get('A'), 0.5);
        assert.equal(centrality.get('B'), 1);
        assert.equal(centrality.get('C'), 0.5);
    });

    it('scores a lone node at 1', () => {
        const graph = new DirectedGraph();
        graph.addNode('SOLO');
        assert.equal(graph.degreeCentrality().get('SOLO'), 1);
    });

    it('counts weakly connected components', () => {
        const graph = graphOf([['A', 'B'], ['C', 'B'], ['X', 'Y']]);
        graph.addNode('LONELY');
        assert.equal(graph.numberOfWeaklyConnectedComponents(), 3);
    });

    it('counts each simple cycle through the focus node once', () => {
        const graph = graphOf([['A', 'B'], ['B', 'A'], ['B', 'C'], ['C', 'A']]);
        assert.equal(graph.countCyclesThrough('A', 1000), 2);
        assert.equal(graph.countCyclesThrough('C', 1000), 1);
    });

    it('counts a self-loop as a cycle', () => {
        assert.equal(graphOf([['A', 'A']]).countCyclesThrough('A', 10), 1);
    });

    it('finds no cycles in a chain or for an absent node', () => {
        const graph = graphOf([['A', 'B'], ['B', 'C']]);
        assert.equal(graph.countCyclesThrough('A', 10), 0);
        assert.equal(graph.countCyclesThrough('MISSING', 10), 0);
    });

    it('stops once the expansion budget is spent', () => {
        const graph = graphOf([['A', 'B'], ['B', 'C'], ['C', 'A']]);
        assert.throws(() => graph.countCyclesThrough('A', 2), CycleSearchBudgetExceededError);
    });
});
