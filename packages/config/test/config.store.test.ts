import { firstValueFrom } from "rxjs";
import { skip, take, toArray } from "rxjs/operators";
import { describe, expect, it } from "vitest";

import { ConfigStore } from "../src/config.store";
import { DEFAULT_CONFIG } from "../src/defaults";

describe("ConfigStore", () => {
  it("seeds itself from the defaults", () => {
    const store = new ConfigStore();

    expect(store.getSnapshot()).toEqual(DEFAULT_CONFIG);
  });

  it("hands out copies of the snapshot", () => {
    const store = new ConfigStore();

    const snapshot = store.getSnapshot();
    snapshot.router.attemptsPerModel = 99;

    expect(store.getSnapshot().router.attemptsPerModel).toBe(3);
  });

  it("returns copies of single sections", () => {
    const store = new ConfigStore();

    const router = store.section("router");
    router.attemptsPerModel = 99;

    expect(store.section("router")).toEqual(DEFAULT_CONFIG.router);
  });

  it("emits a selected value only when it changes", async () => {
    const store = new ConfigStore(structuredClone(DEFAULT_CONFIG));
    const timeouts = firstValueFrom(
      store.select((config) => config.execution.timeoutMs).pipe(take(2), toArray()),
    );

    const louder = structuredClone(DEFAULT_CONFIG);
    louder.logging.level = "debug";
    store.setSnapshot(louder);
    const faster = structuredClone(louder);
    faster.execution.timeoutMs = 10;
    store.setSnapshot(faster);

    expect(await timeouts).toEqual([DEFAULT_CONFIG.execution.timeoutMs, 10]);
  });

  it("only emits snapshots that differ", async () => {
    const store = new ConfigStore(structuredClone(DEFAULT_CONFIG));
    const emissions = firstValueFrom(store.changes$.pipe(skip(1), take(1), toArray()));

    store.setSnapshot(structuredClone(DEFAULT_CONFIG));
    const changed = structuredClone(DEFAULT_CONFIG);
    changed.execution.timeoutMs = 10;
    store.setSnapshot(changed);

    const [next] = await emissions;
    expect(next?.execution.timeoutMs).toBe(10);
  });
});
