import { Node } from '../../database/models';

export interface RankingWeights {
  reputation: number;
  latency: number;
  spareCapacity: number;
}

// Reputation dominates; latency and free slots break near-ties
export const DEFAULT_RANKING_WEIGHTS: RankingWeights = {
  reputation: 0.6,
  latency: 0.25,
  spareCapacity: 0.15,
};

export interface RankedNode {
  node: Node;
  score: number;
}

export class NodeRanker {
  constructor(private readonly weights: RankingWeights = DEFAULT_RANKING_WEIGHTS) {}

  /**
   * Score in 0..100. Latency maps to 100 / (100 + ms), so 0 ms scores 1 and
   * 100 ms scores 0.5.
   */
  score(node: Node): number {
    const reputation = Math.min(Math.max(node.quality.reputationScore, 0), 100) / 100;
    const latency = 100 / (100 + Math.max(node.quality.avgLatencyMs, 0));
    const spare =
      node.maxConnections > 0 ? Math.max(node.maxConnections - node.currentConnections, 0) / node.maxConnections : 0;

    return (
      100 *
      (this.weights.reputation * reputation + this.weights.latency * latency + this.weights.spareCapacity * spare)
    );
  }

  /** Best first; ties go to the node with fewer connections, then the lower id. */
  rank(nodes: Node[]): RankedNode[] {
    return nodes
      .map((node) => ({ node, score: this.score(node) }))
      .sort((a, b) => {
        if (b.score !== a.score) {
          return b.score - a.score;
        }
        if (a.node.currentConnections !== b.node.currentConnections) {
          return a.node.currentConnections - b.node.currentConnections;
        }
        return a.node.id < b.node.id ? -1 : a.node.id > b.node.id ? 1 : 0;
      });
  }
}
