import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import {
  ErrorCode,
  type Explorer,
  NotFoundError,
  type VotePlanDeclaration,
} from '../../src'
import {
  address,
  createTestExplorer,
  makeBlock,
  makeTx,
  planId,
  submitAll,
} from './fixtures'

const A = address(1)
const B = address(2)
const C = address(3)
const PUBLIC_PLAN = planId(1)
const PRIVATE_PLAN = planId(2)

const declaration = (
  votePlanId: string,
  payloadType: VotePlanDeclaration['payloadType'],
  widths: number[],
): VotePlanDeclaration => ({
  kind: 'votePlan',
  votePlanId,
  voteStart: { epoch: 0, slot: 0 },
  voteEnd: { epoch: 1, slot: 0 },
  committeeEnd: { epoch: 2, slot: 0 },
  payloadType,
  proposals: widths.map((end, index) => ({
    externalId: `proposal-${index}`,
    options: { start: 0, end },
  })),
})

describe('vote plans', () => {
  let explorer: Explorer

  beforeAll(async () => {
    explorer = await createTestExplorer()
    await submitAll(explorer, [
      makeBlock(0, null, {
        transactions: [makeTx(1, { outputs: [[A, BigInt(100)]] })],
      }),
      makeBlock(1, 0, {
        transactions: [
          makeTx(2, { certificate: declaration(PUBLIC_PLAN, 'public', [3, 3]) }),
          makeTx(3, { certificate: declaration(PRIVATE_PLAN, 'private', [2]) }),
        ],
      }),
      makeBlock(2, 1, {
        transactions: [
          makeTx(4, {
            inputs: [[A, BigInt(1)]],
            certificate: {
              kind: 'voteCast',
              votePlanId: PUBLIC_PLAN,
              proposalIndex: 0,
              payload: { kind: 'public', choice: 1 },
            },
          }),
          makeTx(5, {
            inputs: [[B, BigInt(0)]],
            certificate: {
              kind: 'voteCast',
              votePlanId: PRIVATE_PLAN,
              proposalIndex: 0,
              payload: {
                kind: 'private',
                encryptedVote: 'enc-1',
                proof: 'proof-1',
              },
            },
          }),
          makeTx(6, {
            inputs: [[C, BigInt(0)]],
            certificate: {
              kind: 'voteCast',
              votePlanId: PRIVATE_PLAN,
              proposalIndex: 0,
              payload: { kind: 'public', choice: 0 },
            },
          }),
        ],
      }),
    ])
  })

  afterAll(async () => {
    await explorer.close()
  })

  it('should report zero weights for an untallied public plan', () => {
    const plan = explorer.query.votePlan(PUBLIC_PLAN).toJSON()
    expect(plan.payloadType).toBe('PUBLIC')
    expect(plan.proposals[0]).toEqual({
      proposalId: 'proposal-0',
      index: 0,
      options: { start: 0, end: 3 },
      tally: {
        __typename: 'TallyPublicStatus',
        results: ['0', '0', '0'],
        options: { start: 0, end: 3 },
      },
    })
  })

  it('should report no results for an undecrypted private plan', () => {
    const plan = explorer.query.votePlan(PRIVATE_PLAN).toJSON()
    expect(plan.payloadType).toBe('PRIVATE')
    expect(plan.proposals[0].tally).toEqual({
      __typename: 'TallyPrivateStatus',
      results: null,
      options: { start: 0, end: 2 },
    })
  })

  it('should page votes and flag a payload of the wrong kind', async () => {
    const votes = await explorer.query
      .votePlan(PRIVATE_PLAN)
      .proposal(0)
      .votes({})

    expect(votes.totalCount).toBe(2)
    expect(votes.edges[0].node).toEqual({
      address: B,
      payload: {
        __typename: 'VotePayloadPrivateStatus',
        encryptedVote: 'enc-1',
        proof: 'proof-1',
      },
    })
    expect(votes.edges[1]).toMatchObject({
      node: null,
      error: { code: ErrorCode.UNKNOWN_VARIANT },
    })
  })

  it('should keep votes per proposal', async () => {
    const plan = explorer.query.votePlan(PUBLIC_PLAN)
    const first = await plan.proposal(0).votes({})
    const second = await plan.proposal(1).votes({})

    expect(first.edges.map((e) => e.node)).toEqual([
      {
        address: A,
        payload: { __typename: 'VotePayloadPublicStatus', choice: 1 },
      },
    ])
    expect(second.totalCount).toBe(0)
    expect(() => plan.proposal(5)).toThrow(NotFoundError)
  })

  it('should list vote plans in declaration order', async () => {
    const plans = await explorer.query.tip().allVotePlans({})
    expect(plans.edges.map((e) => e.node?.id)).toEqual([
      PUBLIC_PLAN,
      PRIVATE_PLAN,
    ])
  })

  it('should apply tallies and isolate a malformed one per proposal', async () => {
    await explorer.submit(
      makeBlock(3, 2, {
        transactions: [
          makeTx(7, {
            certificate: {
              kind: 'encryptedVoteTally',
              votePlanId: PRIVATE_PLAN,
            },
          }),
          makeTx(8, {
            certificate: {
              kind: 'voteTally',
              votePlanId: PUBLIC_PLAN,
              results: [
                [BigInt(1), BigInt(0), BigInt(0)],
                [BigInt(0), BigInt(0)],
              ],
            },
          }),
        ],
      }),
    )

    const publicPlan = explorer.query.votePlan(PUBLIC_PLAN).toJSON()
    expect(publicPlan.proposals[0].tally).toMatchObject({
      results: ['1', '0', '0'],
    })
    expect(publicPlan.proposals[1]).toMatchObject({
      tally: null,
      tallyError: { code: ErrorCode.INTERNAL_CONSISTENCY },
    })

    const privatePlan = explorer.query.votePlan(PRIVATE_PLAN).toJSON()
    expect(privatePlan.proposals[0].tally?.results).toBeNull()
  })

  it('should reveal private results once decrypted', async () => {
    await explorer.submit(
      makeBlock(4, 3, {
        transactions: [
          makeTx(9, {
            certificate: {
              kind: 'voteTally',
              votePlanId: PRIVATE_PLAN,
              results: [[BigInt(5), BigInt(7)]],
            },
          }),
        ],
      }),
    )

    const plan = explorer.query.votePlan(PRIVATE_PLAN).toJSON()
    expect(plan.proposals[0].tally).toEqual({
      __typename: 'TallyPrivateStatus',
      results: ['5', '7'],
      options: { start: 0, end: 2 },
    })
  })

  it('should throw NotFoundError for an undeclared plan', () => {
    expect(() => explorer.query.votePlan(planId(9))).toThrow(NotFoundError)
  })
})
