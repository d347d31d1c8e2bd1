import { describe, it, expect } from "vitest";
import { takeTurn } from "./turns";
import { NpcGuard } from "../entities";
import { FakeRng } from "../test-helpers/fakeRng";
import { makeTestActor, makeTestContext, makeTestEnv, makeTestObject } from "../test-helpers/makeTestActor";

describe("takeTurn", () => {
  it("lets plain entities idle", () => {
    expect(takeTurn(makeTestActor("Hero"), makeTestEnv())).toEqual({
      success: true,
      description: "Hero takes no action",
      tags: ["turn:idle=1"],
    });
    expect(takeTurn(makeTestObject("bench"), makeTestEnv()).description).toBe("bench takes no action");
  });

  it("idles a guard with no target", () => {
    expect(takeTurn(new NpcGuard(), makeTestEnv()).description).toBe("guard takes no action");
  });

  it("counter-attacks the marked target with the weapon", () => {
    const guard = new NpcGuard();
    const hero = makeTestActor("Hero", { LIFE: 10 });
    guard.target = hero;
    guard.setContext(makeTestContext("town square"));
    const rng = new FakeRng([4]);

    const result = takeTurn(guard, makeTestEnv(rng));

    expect(result.success).toBe(true);
    expect(result.description).toBe(
      "guard uses sword to ATTACK.slash Hero\n" +
        "    Hero hit by ATTACK.slash from guard using sword for 4-0 life-points in town square\n" +
        "    Hero life: 10 - 4 = 6"
    );
    expect(result.tags[0]).toBe("turn:action=ATTACK.slash");
    expect(hero.getInteger("LIFE")).toBe(6);
    expect(rng.remaining).toBe(0);
  });

  it("picks one of several weapon actions at random", () => {
    const guard = new NpcGuard();
    guard.weapon.set("ACTIONS", "ATTACK.slash,ATTACK.thrust");
    guard.weapon.set("DAMAGE.thrust", "3");
    const hero = makeTestActor("Hero", { LIFE: 10 });
    guard.target = hero;

    const result = takeTurn(guard, makeTestEnv([1]));

    expect(result.tags[0]).toBe("turn:action=ATTACK.thrust");
    expect(hero.getInteger("LIFE")).toBe(7);
  });

  it("only picks among the weapon's attacks", () => {
    const guard = new NpcGuard();
    guard.weapon.set("ACTIONS", "MENTAL.taunt,ATTACK.slash");
    const hero = makeTestActor("Hero", { LIFE: 10 });
    guard.target = hero;
    const rng = new FakeRng([4]);

    const result = takeTurn(guard, makeTestEnv(rng));

    expect(result.tags[0]).toBe("turn:action=ATTACK.slash");
    expect(hero.getInteger("LIFE")).toBe(6);
    expect(hero.has("MENTAL.taunt")).toBe(false);
    expect(rng.remaining).toBe(0);
  });

  it("idles when the weapon offers no attack", () => {
    const guard = new NpcGuard();
    guard.weapon.set("ACTIONS", "MENTAL.taunt");
    guard.target = makeTestActor("Hero", { LIFE: 10 });

    expect(takeTurn(guard, makeTestEnv()).description).toBe("guard takes no action");
  });

  it("reports an incapacitated guard", () => {
    const guard = new NpcGuard();
    guard.incapacitated = true;

    const result = takeTurn(guard, makeTestEnv());

    expect(result.success).toBe(false);
    expect(result.description).toBe("guard is incapacitated");
  });

  it("forgets a dead target", () => {
    const guard = new NpcGuard();
    const hero = makeTestActor("Hero");
    hero.alive = false;
    guard.target = hero;

    expect(takeTurn(guard, makeTestEnv()).description).toBe("guard takes no action");
    expect(guard.target).toBeNull();
  });
});
