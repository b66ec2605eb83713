import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../errors.js";
import { approvingGuard, recordingGuard } from "../testing/recording-guard.js";
import { approve } from "./guard.js";
import { ALL_ACTIONS, EntityKind } from "./entity-kind.js";

function makeKind() {
  return new EntityKind({
    name: "ticket",
    states: ["open", "closed"],
    actions: ["close", "reopen"],
  });
}

describe("EntityKind", () => {
  it("rejects an empty name and empty or repeated members", () => {
    expect(() => new EntityKind({ name: "", states: ["a"], actions: ["go"] })).toThrow(
      "Entity kind name must not be empty",
    );
    expect(() => new EntityKind({ name: "t", states: [], actions: ["go"] })).toThrow(
      'Entity kind "t" must declare at least one state',
    );
    expect(() => new EntityKind({ name: "t", states: ["a", "a"], actions: ["go"] })).toThrow(
      'Entity kind "t" declares state "a" twice',
    );
    expect(() => new EntityKind({ name: "t", states: ["a"], actions: [] })).toThrow(
      ConfigurationError,
    );
  });

  it("knows its states", () => {
    const kind = makeKind();
    expect(kind.hasState("open")).toBe(true);
    expect(kind.hasState("archived")).toBe(false);
  });

  it("stops accepting transitions once sealed", () => {
    const kind = makeKind();
    kind.addTransition("open", "close", "closed");
    const table = kind.seal();

    expect(kind.sealed).toBe(true);
    expect(kind.seal()).toBe(table);
    expect(() => kind.addTransition("closed", "reopen", "open")).toThrow(
      'Transition table for "ticket" is sealed; register transitions before creating entities',
    );
  });

  it("creates action chains lazily and rejects unknown actions", () => {
    const kind = makeKind();
    kind.chain(ALL_ACTIONS).add(approvingGuard("Auth"));
    expect(kind.guardsFor("close").map((g) => g.name)).toEqual(["Auth"]);

    const chain = kind.chain("close");
    expect(kind.chain("close")).toBe(chain);
    chain.add(approvingGuard("Owner"));
    expect(kind.guardsFor("close").map((g) => g.name)).toEqual(["Auth", "Owner"]);

    const loose = new EntityKind<string, string>({ name: "loose", states: ["a"], actions: ["go"] });
    expect(() => loose.chain("archive")).toThrow('Unknown action "archive" for kind "loose"');
  });

  it("lets action guards depend on kind-wide guards", () => {
    const kind = makeKind();
    kind.chain(ALL_ACTIONS).add(approvingGuard("Auth"));
    kind.chain("close").add(recordingGuard("Owner", approve(), ["Auth"]));

    expect(kind.dependentsOfShared("Auth")).toEqual(["Owner"]);
    expect(kind.dependentsOfShared("Other")).toEqual([]);
  });

  it("refuses kind-wide changes that strand an action guard's dependency", () => {
    const kind = makeKind();
    const shared = kind.chain(ALL_ACTIONS);
    shared.add(approvingGuard("Auth")).add(approvingGuard("Audit"));
    kind.chain("close").add(recordingGuard("Owner", approve(), ["Auth"]));

    expect(() => shared.remove("Auth")).toThrow(
      'Guard "Owner" must run after "Auth", which is not registered',
    );
    expect(() => shared.clear()).toThrow(ConfigurationError);
    expect(shared.names()).toEqual(["Auth", "Audit"]);

    shared.reorder(["Audit", "Auth"]);
    expect(shared.remove("Audit")).toBe(true);
    expect(shared.names()).toEqual(["Auth"]);
  });

  it("hands out a guard list that later chain changes do not touch", () => {
    const kind = makeKind();
    kind.chain(ALL_ACTIONS).add(approvingGuard("Auth"));
    kind.chain("close").add(approvingGuard("Owner"));

    const guards = kind.guardsFor("close");
    kind.chain("close").add(approvingGuard("Late"));
    kind.chain(ALL_ACTIONS).add(approvingGuard("Audit"), "prepend");

    expect(Object.isFrozen(guards)).toBe(true);
    expect(guards.map((g) => g.name)).toEqual(["Auth", "Owner"]);
  });
});
