import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StateStoreError } from "../../../src/connectors/core/errors.js";
import {
  FileStateStore,
  MemoryStateStore,
  parseState,
  StateManager,
} from "../../../src/connectors/core/state.js";

describe("StateManager", () => {
  it("has no bookmark for an unseen partition", () => {
    const mgr = new StateManager();
    expect(mgr.getBookmark("daily_prices", "ticker", "AAPL")).toBeNull();
  });

  it("records a bookmark per partition", () => {
    const mgr = new StateManager();
    mgr.advanceBookmark("daily_prices", "date", "ticker", "AAPL", "2023-01-05");
    mgr.advanceBookmark("daily_prices", "date", "ticker", "MSFT", "2023-02-01");

    expect(mgr.getBookmark("daily_prices", "ticker", "AAPL")).toBe("2023-01-05");
    expect(mgr.snapshot()).toEqual({
      bookmarks: {
        daily_prices: {
          partitions: [
            {
              context: { ticker: "AAPL" },
              replication_key: "date",
              replication_key_value: "2023-01-05",
            },
            {
              context: { ticker: "MSFT" },
              replication_key: "date",
              replication_key_value: "2023-02-01",
            },
          ],
        },
      },
    });
  });

  it("never moves a bookmark backwards", () => {
    const mgr = new StateManager();
    expect(mgr.advanceBookmark("daily_prices", "date", "ticker", "AAPL", "2023-01-05")).toBe(true);
    expect(mgr.advanceBookmark("daily_prices", "date", "ticker", "AAPL", "2023-01-03")).toBe(false);
    expect(mgr.advanceBookmark("daily_prices", "date", "ticker", "AAPL", "2023-01-05")).toBe(false);
    expect(mgr.getBookmark("daily_prices", "ticker", "AAPL")).toBe("2023-01-05");
  });

  it("compares numeric cursors numerically", () => {
    const mgr = new StateManager();
    mgr.advanceBookmark("s", "seq", "ticker", "A", 9);
    mgr.advanceBookmark("s", "seq", "ticker", "A", 10);
    expect(mgr.getBookmark("s", "ticker", "A")).toBe(10);
  });

  it("snapshots are detached from later mutations", () => {
    const mgr = new StateManager();
    mgr.advanceBookmark("daily_prices", "date", "ticker", "AAPL", "2023-01-05");
    const snap = mgr.snapshot();
    mgr.advanceBookmark("daily_prices", "date", "ticker", "AAPL", "2023-01-09");
    expect(snap.bookmarks.daily_prices.partitions[0].replication_key_value).toBe("2023-01-05");
  });
});

describe("parseState", () => {
  it("fills defaults for an empty document", () => {
    expect(parseState({})).toEqual({ bookmarks: {} });
  });

  it("rejects malformed bookmarks", () => {
    expect(() =>
      parseState({ bookmarks: { daily_prices: { partitions: [{ context: {} }] } } }),
    ).toThrow(StateStoreError);
  });
});

describe("FileStateStore", () => {
  let tmpDir: string;
  let stateFile: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "tap-tiingo-state-"));
    stateFile = path.join(tmpDir, "state.json");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("returns empty state when no file exists", async () => {
    const store = new FileStateStore(stateFile);
    expect(await store.load()).toEqual({ bookmarks: {} });
  });

  it("loads existing state from disk", async () => {
    fs.writeFileSync(
      stateFile,
      JSON.stringify({
        bookmarks: {
          daily_prices: {
            partitions: [
              {
                context: { ticker: "AAPL" },
                replication_key: "date",
                replication_key_value: "2023-01-05",
              },
            ],
          },
        },
      }),
    );
    const store = new FileStateStore(stateFile);
    const mgr = new StateManager(await store.load());
    expect(mgr.getBookmark("daily_prices", "ticker", "AAPL")).toBe("2023-01-05");
  });

  it("writes atomically and leaves no temp file", async () => {
    const store = new FileStateStore(path.join(tmpDir, "nested", "state.json"));
    await store.write({ bookmarks: {} });

    expect(fs.existsSync(path.join(tmpDir, "nested", "state.json"))).toBe(true);
    expect(fs.existsSync(path.join(tmpDir, "nested", "state.json.tmp"))).toBe(false);
  });

  it("round-trips the last written checkpoint", async () => {
    const store = new FileStateStore(stateFile);
    const mgr = new StateManager();
    mgr.advanceBookmark("daily_prices", "date", "ticker", "AAPL", "2023-01-04");
    await store.write(mgr.snapshot());
    mgr.advanceBookmark("daily_prices", "date", "ticker", "AAPL", "2023-01-05");
    await store.write(mgr.snapshot());

    const reloaded = new StateManager(await store.load());
    expect(reloaded.getBookmark("daily_prices", "ticker", "AAPL")).toBe("2023-01-05");
  });

  it("fails loudly on a corrupt state file", async () => {
    fs.writeFileSync(stateFile, "{not json");
    await expect(new FileStateStore(stateFile).load()).rejects.toThrow(StateStoreError);
  });
});

describe("MemoryStateStore", () => {
  it("keeps every snapshot and loads the latest", async () => {
    const store = new MemoryStateStore();
    await store.write({ bookmarks: {} });
    await store.write({
      bookmarks: {
        daily_prices: {
          partitions: [
            { context: { ticker: "AAPL" }, replication_key: "date", replication_key_value: "2023-01-05" },
          ],
        },
      },
    });
    expect(store.snapshots).toHaveLength(2);
    const loaded = await store.load();
    expect(loaded.bookmarks.daily_prices.partitions[0].replication_key_value).toBe("2023-01-05");
  });
});
