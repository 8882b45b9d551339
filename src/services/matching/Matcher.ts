import { Node, NodeGroup, Protocol } from '../../database/models';
import { CapacityRaceError, NoEligibleNodeError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { NodeDirectory } from '../directory/NodeDirectory';
import { NodeRanker } from './NodeRanker';

export interface MatchRequest {
  userId: string;
  protocol: Protocol;
  clientCountry: string;
  group?: NodeGroup;
  countryPreference?: string;
}

export interface MatcherOptions {
  /** Lost reservations tolerated before giving up. */
  retryLimit: number;
}

export class Matcher {
  constructor(
    private readonly directory: NodeDirectory,
    private readonly options: MatcherOptions,
    private readonly ranker: NodeRanker = new NodeRanker()
  ) {}

  /**
   * Picks the best eligible node and reserves one of its slots. The returned
   * node already counts the reservation.
   */
  async match(request: MatchRequest): Promise<Node> {
    const eligible = await this.directory.listEligible({
      protocol: request.protocol,
      clientCountry: request.clientCountry,
      requesterId: request.userId,
      group: request.group,
      countryPreference: request.countryPreference,
    });

    if (eligible.length === 0) {
      logger.info('No eligible node for request', {
        userId: request.userId,
        protocol: request.protocol,
        group: request.group,
        country: request.countryPreference,
      });
      throw new NoEligibleNodeError();
    }

    let lostRaces = 0;
    for (const { node, score } of this.ranker.rank(eligible)) {
      try {
        const reserved = await this.directory.reserveSlot(node.id);
        logger.debug('Node matched', { nodeId: node.id, score, candidates: eligible.length, lostRaces });
        return reserved;
      } catch (error) {
        if (!(error instanceof CapacityRaceError)) {
          throw error;
        }
        lostRaces++;
        logger.debug('Lost reservation race', { nodeId: node.id, lostRaces });
        if (lostRaces > this.options.retryLimit) {
          break;
        }
      }
    }

    logger.info('Matching gave up after lost reservations', { userId: request.userId, lostRaces });
    throw new NoEligibleNodeError();
  }
}
