import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../errors.js";
import { TransitionTable } from "./transition-table.js";
import type { TransitionRule } from "./types/transition.js";

const STATES = ["a", "b", "c", "d"] as const;
const ACTIONS = ["go", "back", "stop"] as const;
type S = (typeof STATES)[number];
type A = (typeof ACTIONS)[number];

function arbRule(): fc.Arbitrary<TransitionRule<S, A>> {
  return fc.record({
    from: fc.constantFrom(...STATES),
    action: fc.constantFrom(...ACTIONS),
    to: fc.constantFrom(...STATES),
  });
}

function arbUniqueRules(): fc.Arbitrary<TransitionRule<S, A>[]> {
  return fc.uniqueArray(arbRule(), { selector: (r) => `${r.from}|${r.action}`, maxLength: 12 });
}

describe("transition table property tests", () => {
  it("lookups are idempotent and agree with the registered rules", () => {
    fc.assert(
      fc.property(
        arbUniqueRules(),
        fc.constantFrom(...STATES),
        fc.constantFrom(...ACTIONS),
        (rules, from, action) => {
          const table = new TransitionTable(rules);
          const first = table.allowedTransition(from, action);
          const second = table.allowedTransition(from, action);
          expect(second).toBe(first);
          const rule = rules.find((r) => r.from === from && r.action === action);
          expect(first).toBe(rule?.to);
        },
      ),
    );
  });

  it("a state is terminal exactly when no rule leaves it", () => {
    fc.assert(
      fc.property(arbUniqueRules(), fc.constantFrom(...STATES), (rules, state) => {
        const table = new TransitionTable(rules);
        expect(table.isTerminal(state)).toBe(!rules.some((r) => r.from === state));
      }),
    );
  });

  it("any repeated (from, action) pair is a configuration error", () => {
    fc.assert(
      fc.property(arbUniqueRules(), arbRule(), (rules, extra) => {
        const clash = rules.some((r) => r.from === extra.from && r.action === extra.action);
        const build = () => new TransitionTable([...rules, extra]);
        if (clash) {
          expect(build).toThrow(ConfigurationError);
        } else {
          expect(build().size).toBe(rules.length + 1);
        }
      }),
    );
  });
});
