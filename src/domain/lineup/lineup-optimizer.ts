/**
 * Lineup optimizer: best-possible starting lineup for one team-week.
 *
 * Two assignment policies are available and every result records which one
 * produced it, since they can disagree on the reported potential points:
 *
 * - `greedy` (default): walk the slot template in declared order and give each
 *   slot the highest-scoring unused eligible player. A rigid slot early in the
 *   template can consume a player that a later flex slot needed, so this may
 *   under-report the true optimum.
 * - `exact`: maximum-weight assignment of players to slot instances using
 *   min-cost max-flow.
 */

import { PositionSlot, canPositionFillSlot, isStarterSlot } from './slot-eligibility';

export type LineupStrategy = 'greedy' | 'exact';

export interface LineupCandidate {
  id: string;
  position: string;
}

export interface OptimizeInput {
  /** Ordered roster-slot template; reserve slots are ignored */
  template: readonly PositionSlot[];
  /** Players available for the week, in roster order */
  players: readonly LineupCandidate[];
  /** Points scored by each player (playerId -> points) */
  pointsByPlayerId: ReadonlyMap<string, number>;
}

export interface SlotAssignment {
  slot: PositionSlot;
  playerId: string | null;
  points: number;
}

export interface OptimizeOutput {
  strategy: LineupStrategy;
  optimalPoints: number;
  assignments: SlotAssignment[];
  usedPlayerIds: Set<string>;
}

export function optimizeLineup(input: OptimizeInput, strategy: LineupStrategy = 'greedy'): OptimizeOutput {
  return strategy === 'exact' ? optimizeExact(input) : optimizeGreedy(input);
}

/**
 * Declared-slot-order greedy assignment.
 */
export function optimizeGreedy(input: OptimizeInput): OptimizeOutput {
  const { template, players, pointsByPlayerId } = input;
  const used = new Set<string>();
  const assignments: SlotAssignment[] = [];
  let total = 0;

  for (const slot of template) {
    if (!isStarterSlot(slot)) continue;

    let best: LineupCandidate | null = null;
    let bestPoints = Number.NEGATIVE_INFINITY;
    for (const player of players) {
      if (used.has(player.id) || !canPositionFillSlot(player.position, slot)) continue;
      const points = pointsByPlayerId.get(player.id) ?? 0;
      // Strict comparison keeps the first player in roster order on ties
      if (points > bestPoints) {
        best = player;
        bestPoints = points;
      }
    }

    if (best) {
      used.add(best.id);
      total += bestPoints;
      assignments.push({ slot, playerId: best.id, points: bestPoints });
    } else {
      assignments.push({ slot, playerId: null, points: 0 });
    }
  }

  return {
    strategy: 'greedy',
    optimalPoints: Math.round(total * 100) / 100,
    assignments,
    usedPlayerIds: used,
  };
}

/**
 * Edge in the flow network
 */
interface Edge {
  to: number;
  rev: number; // Index of reverse edge in graph[to]
  cap: number;
  cost: number;
}

/**
 * Min-cost max-flow implementation using SPFA (Bellman-Ford variant).
 */
class MinCostMaxFlow {
  private readonly graph: Edge[][];

  constructor(private readonly n: number) {
    this.graph = Array.from({ length: n }, () => []);
  }

  /**
   * Add an edge with given capacity and cost.
   * Also adds reverse edge with 0 capacity and negative cost.
   */
  addEdge(from: number, to: number, cap: number, cost: number): void {
    this.graph[from].push({ to, cap, cost, rev: this.graph[to].length });
    this.graph[to].push({ to: from, cap: 0, cost: -cost, rev: this.graph[from].length - 1 });
  }

  run(source: number, sink: number, maxFlow: number): number {
    let totalFlow = 0;
    const INF = Number.MAX_SAFE_INTEGER;

    while (totalFlow < maxFlow) {
      const dist = Array<number>(this.n).fill(INF);
      const inQueue = Array<boolean>(this.n).fill(false);
      const parent = Array<number>(this.n).fill(-1);
      const parentEdge = Array<number>(this.n).fill(-1);

      dist[source] = 0;
      const queue: number[] = [source];
      inQueue[source] = true;

      while (queue.length > 0) {
        const u = queue.shift();
        if (u === undefined) break;
        inQueue[u] = false;

        for (let i = 0; i < this.graph[u].length; i++) {
          const edge = this.graph[u][i];
          if (edge.cap > 0 && dist[u] + edge.cost < dist[edge.to]) {
            dist[edge.to] = dist[u] + edge.cost;
            parent[edge.to] = u;
            parentEdge[edge.to] = i;
            if (!inQueue[edge.to]) {
              queue.push(edge.to);
              inQueue[edge.to] = true;
            }
          }
        }
      }

      // No augmenting path found
      if (dist[sink] === INF) break;

      // Every edge out of the source has capacity 1, so each path carries one unit
      let v = sink;
      while (v !== source) {
        const u = parent[v];
        const edge = this.graph[u][parentEdge[v]];
        edge.cap -= 1;
        this.graph[v][edge.rev].cap += 1;
        v = u;
      }

      totalFlow += 1;
    }

    return totalFlow;
  }

  hasSaturatedEdge(from: number, to: number): boolean {
    return this.graph[from].some((edge) => edge.to === to && edge.cap === 0);
  }
}

/**
 * Exact assignment using min-cost max-flow.
 *
 * Source -> players (cap 1) -> eligible slot instances (cap 1, cost = -points)
 * -> sink (cap 1). Negative costs turn max-score into min-cost.
 */
export function optimizeExact(input: OptimizeInput): OptimizeOutput {
  const { template, players, pointsByPlayerId } = input;

  // Scale factor for integer costs (avoid floating point issues)
  const SCALE = 1000000;

  const slots = template.filter(isStarterSlot);
  const P = players.length;
  const S = slots.length;
  const source = 0;
  const sink = P + S + 1;
  const mcmf = new MinCostMaxFlow(sink + 1);

  const playerNode = (idx: number) => idx + 1;
  const slotNode = (idx: number) => P + idx + 1;

  for (let i = 0; i < P; i++) {
    mcmf.addEdge(source, playerNode(i), 1, 0);
  }

  for (let i = 0; i < P; i++) {
    const player = players[i];
    const cost = Math.round(-(pointsByPlayerId.get(player.id) ?? 0) * SCALE);
    for (let j = 0; j < S; j++) {
      if (canPositionFillSlot(player.position, slots[j])) {
        mcmf.addEdge(playerNode(i), slotNode(j), 1, cost);
      }
    }
  }

  for (let j = 0; j < S; j++) {
    mcmf.addEdge(slotNode(j), sink, 1, 0);
  }

  mcmf.run(source, sink, S);

  const assignments: SlotAssignment[] = slots.map((slot) => ({ slot, playerId: null, points: 0 }));
  const used = new Set<string>();
  let total = 0;

  for (let i = 0; i < P; i++) {
    for (let j = 0; j < S; j++) {
      if (assignments[j].playerId !== null) continue;
      if (!canPositionFillSlot(players[i].position, slots[j])) continue;
      if (mcmf.hasSaturatedEdge(playerNode(i), slotNode(j))) {
        const points = pointsByPlayerId.get(players[i].id) ?? 0;
        assignments[j] = { slot: slots[j], playerId: players[i].id, points };
        used.add(players[i].id);
        total += points;
        break;
      }
    }
  }

  return {
    strategy: 'exact',
    optimalPoints: Math.round(total * 100) / 100,
    assignments,
    usedPlayerIds: used,
  };
}
