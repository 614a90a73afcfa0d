/**
 * Tests for A* search
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { astar } from '../../src/search/astar.js';
import { dijkstra } from '../../src/search/dijkstra.js';
import { goalState } from '../../src/search/state-key.js';
import { PreconditionError } from '../../src/domain/errors.js';
import { Vec2D } from '../../src/measure/vec2d.js';
import { neighborsOf, CARDINALS } from '../../src/measure/direction.js';

type Edges = Record<string, [string, number][]>;

const weighted = (graph: Edges) => (node: string) => graph[node];

function gridMoves(costs: Record<string, number> = {}) {
  return (position: Vec2D) =>
    neighborsOf(position, CARDINALS, { rows: 3, cols: 3 })
      .map((next): [Vec2D, number] => [next, costs[next.key()] ?? 1]);
}

const start = new Vec2D(0, 0);
const goal = new Vec2D(2, 2);
const manhattan = (position: Vec2D) => position.manhattan(goal);

describe('A*', () => {
  it('should return cost 4 across a unit 3x3 grid with a Manhattan heuristic', () => {
    const result = astar(start, gridMoves(), goalState(goal), manhattan);

    assert.ok(result);
    assert.strictEqual(result.cost, 4);
    assert.strictEqual(result.path.length, 5);
    assert.deepStrictEqual(result.path[0], start);
    assert.deepStrictEqual(result.path[4], goal);
  });

  it('should expand fewer states than Dijkstra toward a nearby goal', () => {
    const target = new Vec2D(2, 0);
    const informed = astar(start, gridMoves(), goalState(target), position => position.manhattan(target));
    const blind = dijkstra(start, gridMoves(), goalState(target));

    assert.ok(informed && blind);
    assert.strictEqual(informed.explored, 2);
    assert.strictEqual(blind.explored, 3);
  });

  it('should route around an expensive cell', () => {
    const costs = { '1,1': 10 };
    const result = astar(start, gridMoves(costs), goalState(goal), manhattan);

    assert.ok(result);
    assert.strictEqual(result.cost, 4);
    assert.ok(!result.path.some(position => position.equals(new Vec2D(1, 1))));
  });

  it('should match Dijkstra when the heuristic is zero', () => {
    const costs = { '1,0': 3, '2,1': 5 };
    const informed = astar(start, gridMoves(costs), goalState(goal), () => 0);
    const blind = dijkstra(start, gridMoves(costs), goalState(goal));

    assert.deepStrictEqual(informed, blind);
  });

  it('should stay optimal with an admissible but inconsistent heuristic', () => {
    //  S --1--> A --1--> B --5--> G
    //  S --4--> B
    const edges: Edges = { S: [['A', 1], ['B', 4]], A: [['B', 1]], B: [['G', 5]], G: [] };
    const estimates: Record<string, number> = { S: 0, A: 5, B: 0, G: 0 };

    const result = astar('S', weighted(edges), goalState('G'), node => estimates[node]);

    // B is expanded twice: first via S, then via the cheaper A
    assert.deepStrictEqual(result, { path: ['S', 'A', 'B', 'G'], cost: 7, explored: 4 });
  });

  it('should return cost 0 when the start is the goal', () => {
    const result = astar(start, gridMoves(), goalState(start), manhattan);

    assert.deepStrictEqual(result, { path: [start], cost: 0, explored: 0 });
  });

  it('should return null for an unreachable goal', () => {
    const edges: Edges = { A: [['B', 1]], B: [['A', 1]], C: [] };

    assert.strictEqual(astar('A', weighted(edges), goalState('C'), () => 0), null);
  });

  it('should reject an inconsistent heuristic when validating', () => {
    const edges: Edges = { A: [['B', 1]], B: [['C', 1]], C: [] };
    const estimates: Record<string, number> = { A: 0, B: 5, C: 0 };

    assert.throws(
      () => astar('A', weighted(edges), goalState('C'), node => estimates[node], { validate: true }),
      PreconditionError
    );
  });

  it('should reject a negative heuristic value when validating', () => {
    const edges: Edges = { A: [['B', 1]], B: [] };

    assert.throws(
      () => astar('A', weighted(edges), goalState('B'), () => -1, { validate: true }),
      /Heuristic must return a non-negative finite number, got -1/
    );
  });

  it('should reject negative costs when validating', () => {
    const edges: Edges = { A: [['B', -2]], B: [] };

    assert.throws(
      () => astar('A', weighted(edges), goalState('B'), () => 0, { validate: true }),
      PreconditionError
    );
  });

  it('should accept a consistent heuristic when validating', () => {
    const result = astar(start, gridMoves({ '1,1': 10 }), goalState(goal), manhattan, { validate: true });

    assert.ok(result);
    assert.strictEqual(result.cost, 4);
  });
});
