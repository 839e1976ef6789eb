import type { ConsensusConfig } from '@quorumledger/core';
import { z } from 'zod';

import type { Body } from '../body.js';

import { check, checkNotEmpty, UintSchema, type CheckResult } from './shared.js';

export interface HashedUrls {
  hash: string;
  urls: readonly string[];
}

export interface VoteTally {
  count: number;
  yes: number;
  no: number;
  abs: number;
}

export interface CongressVotingResultProps {
  ballotStamps: HashedUrls;
  voters: HashedUrls;
  result: VoteTally;
  congressVotingHash: string;
}

/**
 * Records the outcome of a congress vote. Ballot stamps and the voter list
 * are published off-ledger; only their hashes and locations are carried here.
 */
export class CongressVotingResult implements Body {
  readonly ballotStamps: HashedUrls;
  readonly voters: HashedUrls;
  readonly result: Readonly<VoteTally>;
  readonly congressVotingHash: string;

  constructor(props: CongressVotingResultProps) {
    this.ballotStamps = { hash: props.ballotStamps.hash, urls: [...props.ballotStamps.urls] };
    this.voters = { hash: props.voters.hash, urls: [...props.voters.urls] };
    this.result = { ...props.result };
    this.congressVotingHash = props.congressVotingHash;
  }

  isWellFormed(_config: ConsensusConfig): CheckResult {
    const { count, yes, no, abs } = this.result;

    return checkNotEmpty(this.ballotStamps.hash, 'ballot_stamps.hash')
      .andThen(() => checkNotEmpty(this.ballotStamps.urls, 'ballot_stamps.urls'))
      .andThen(() => checkNotEmpty(this.voters.hash, 'voters.hash'))
      .andThen(() => checkNotEmpty(this.voters.urls, 'voters.urls'))
      .andThen(() =>
        check(
          count === yes + no + abs,
          'INVALID_OPERATION_FIELD',
          'result',
          `vote count ${String(count)} does not equal yes + no + abs (${String(yes + no + abs)})`
        )
      )
      .andThen(() => checkNotEmpty(this.congressVotingHash, 'congress_voting_hash'));
  }

  hasFee(): boolean {
    return true;
  }

  toJSON(): {
    ballot_stamps: { hash: string; urls: string[] };
    voters: { hash: string; urls: string[] };
    result: VoteTally;
    congress_voting_hash: string;
  } {
    return {
      ballot_stamps: { hash: this.ballotStamps.hash, urls: [...this.ballotStamps.urls] },
      voters: { hash: this.voters.hash, urls: [...this.voters.urls] },
      result: { count: this.result.count, yes: this.result.yes, no: this.result.no, abs: this.result.abs },
      congress_voting_hash: this.congressVotingHash,
    };
  }
}

const HashedUrlsSchema = z.object({
  hash: z.string(),
  urls: z.array(z.string()),
});

export const CongressVotingResultSchema = z
  .object({
    ballot_stamps: HashedUrlsSchema,
    voters: HashedUrlsSchema,
    result: z.object({
      count: UintSchema,
      yes: UintSchema,
      no: UintSchema,
      abs: UintSchema,
    }),
    congress_voting_hash: z.string(),
  })
  .transform(
    (fields) =>
      new CongressVotingResult({
        ballotStamps: fields.ballot_stamps,
        voters: fields.voters,
        result: fields.result,
        congressVotingHash: fields.congress_voting_hash,
      })
  );
