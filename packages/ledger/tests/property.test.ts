/**
 * Property-Based Tests for @pledgebook/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY sequence
 * of contributions:
 *
 * 1. Held balance equals the sum of contributor records
 * 2. A contribution is accepted exactly when it converts to at least the minimum
 * 3. Withdrawal releases the whole balance and leaves nothing behind
 * 4. Non-owner withdrawal never changes state
 * 5. Snapshot → restore → snapshot preserves the books
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { MockPriceFeed } from "@pledgebook/price-feed";
import { ContributionLedger } from "../src/ledger.js";
import { convert } from "../src/rate-converter.js";
import { InMemorySettlement } from "../src/settlement.js";
import { LedgerError, MINIMUM_CONTRIBUTION } from "../src/types.js";

// =============================================================================
// Arbitraries
// =============================================================================

const OWNER = "owner";

const arbContributor = fc.constantFrom("alice", "bob", "carol", "dave");

/** Up to 10 native units, skewed so both sides of the minimum show up. */
const arbRawAmount = fc.oneof(
  fc.bigInt({ min: 0n, max: 10n ** 16n }),
  fc.bigInt({ min: 0n, max: 10n * 10n ** 18n }),
);

/** Rate between $1 and $10000 at 8 decimals. */
const arbAnswer = fc.bigInt({ min: 100_000_000n, max: 1_000_000_000_000n });

const arbContributions = fc.array(fc.tuple(arbContributor, arbRawAmount), {
  minLength: 0,
  maxLength: 25,
});

// =============================================================================
// Helpers
// =============================================================================

function setup(answer: bigint) {
  const feed = new MockPriceFeed(8, answer, { clock: () => 0 });
  const settlement = new InMemorySettlement();
  const ledger = new ContributionLedger({ owner: OWNER, priceFeed: feed, settlement });
  return { feed, settlement, ledger };
}

/** Apply contributions, swallowing only threshold rejections. */
function applyAll(
  ledger: ContributionLedger,
  contributions: readonly (readonly [string, bigint])[],
): number {
  let accepted = 0;
  for (const [contributor, amount] of contributions) {
    try {
      ledger.contribute(contributor, amount);
      accepted++;
    } catch (e) {
      if (!(e instanceof LedgerError) || e.code !== "INSUFFICIENT_CONTRIBUTION") {
        throw e;
      }
    }
  }
  return accepted;
}

function sumOfRecords(ledger: ContributionLedger): bigint {
  let sum = 0n;
  for (const contributor of new Set(ledger.getContributors())) {
    sum += ledger.getAmountContributed(contributor);
  }
  return sum;
}

// =============================================================================
// Properties
// =============================================================================

describe("property: balance equals the sum of records", () => {
  it("after any sequence of contributions", () => {
    fc.assert(
      fc.property(arbAnswer, arbContributions, (answer, contributions) => {
        const { ledger } = setup(answer);
        const accepted = applyAll(ledger, contributions);

        expect(ledger.balance).toBe(sumOfRecords(ledger));
        expect(ledger.contributorCount).toBe(accepted);
      }),
      { numRuns: 200 },
    );
  });
});

describe("property: threshold decides acceptance", () => {
  it("accepts exactly when the converted value reaches the minimum", () => {
    fc.assert(
      fc.property(arbAnswer, arbContributor, arbRawAmount, (answer, contributor, amount) => {
        const { feed, ledger } = setup(answer);
        const qualifies = convert(amount, feed) >= MINIMUM_CONTRIBUTION;

        const accepted = applyAll(ledger, [[contributor, amount]]);

        expect(accepted === 1).toBe(qualifies);
        expect(ledger.getAmountContributed(contributor)).toBe(qualifies ? amount : 0n);
      }),
      { numRuns: 300 },
    );
  });
});

describe("property: withdrawal sweeps everything", () => {
  it("releases the full balance and zeroes every record", () => {
    fc.assert(
      fc.property(arbAnswer, arbContributions, (answer, contributions) => {
        const { ledger, settlement } = setup(answer);
        applyAll(ledger, contributions);
        const contributors = new Set(ledger.getContributors());
        const held = ledger.balance;

        const receipt = ledger.withdraw(OWNER);

        expect(receipt.amount).toBe(held);
        expect(settlement.balanceOf(OWNER)).toBe(held);
        expect(ledger.balance).toBe(0n);
        expect(ledger.contributorCount).toBe(0);
        for (const contributor of contributors) {
          expect(ledger.getAmountContributed(contributor)).toBe(0n);
        }
      }),
      { numRuns: 200 },
    );
  });

  it("non-owners never change state", () => {
    fc.assert(
      fc.property(arbAnswer, arbContributions, arbContributor, (answer, contributions, caller) => {
        const { ledger } = setup(answer);
        applyAll(ledger, contributions);
        const before = JSON.stringify({ ...ledger.snapshot(), createdAt: "" });

        expect(() => ledger.withdraw(caller)).toThrow(LedgerError);
        expect(() => ledger.cheaperWithdraw(caller)).toThrow(LedgerError);

        expect(JSON.stringify({ ...ledger.snapshot(), createdAt: "" })).toBe(before);
      }),
      { numRuns: 200 },
    );
  });
});

describe("property: snapshot round-trip", () => {
  it("snapshot → restore → snapshot is identical", () => {
    fc.assert(
      fc.property(arbAnswer, arbContributions, (answer, contributions) => {
        const { feed, settlement, ledger } = setup(answer);
        applyAll(ledger, contributions);

        const snap = ledger.snapshot();
        const restored = ContributionLedger.fromSnapshot(snap, { priceFeed: feed, settlement });

        expect({ ...restored.snapshot(), createdAt: snap.createdAt }).toEqual(snap);
      }),
      { numRuns: 200 },
    );
  });
});
