import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { SqliteStore } from "../../src/sqlite-store.js";
import { describeStoreContract, serverRecord } from "./store-contract.js";

describe("SqliteStore", () => {
  let tmpDir: string;
  let dbPath: string;
  let opened: SqliteStore[];

  const open = (): SqliteStore => {
    const store = new SqliteStore(dbPath);
    opened.push(store);
    return store;
  };

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "catalog-sqlite-test-"));
    dbPath = join(tmpDir, "catalog.db");
    opened = [];
  });

  afterEach(() => {
    for (const store of opened) {
      store.close();
    }
    rmSync(tmpDir, { recursive: true, force: true });
  });

  describeStoreContract(open);

  describe("persistence across re-instantiation", () => {
    it("keeps the whole hierarchy", () => {
      const first = new SqliteStore(dbPath);
      const server = first.insertServer({ ...serverRecord("alpha"), authentication: "nickserv", userPassword: "test-secret" });
      const channel = first.insertChannel({ serverId: server.id, name: "#one", password: "chan-secret" });
      const bot = first.insertBot({ channelId: channel.id, name: "xdcc", listEnabled: true });
      first.insertPack({ botId: bot.id, number: 7, fileName: "a.bin", fileSize: "1G" });
      first.close();

      const second = open();
      expect(second.findServerByHost("alpha")).toEqual(server);
      expect(second.findChannel(server.id, "#one")?.password).toBe("chan-secret");
      expect(second.findBot(channel.id, "xdcc")?.listEnabled).toBe(true);
      expect(second.findPack(bot.id, 7)?.fileName).toBe("a.bin");
    });
  });

  it("creates the directory of the database file", () => {
    dbPath = join(tmpDir, "nested", "deeper", "catalog.db");

    open();

    expect(existsSync(dbPath)).toBe(true);
  });

  it("stores the list flag as a boolean", () => {
    const store = open();
    const server = store.insertServer(serverRecord("alpha"));
    const channel = store.insertChannel({ serverId: server.id, name: "#one", password: null });
    const bot = store.insertBot({ channelId: channel.id, name: "xdcc", listEnabled: false });

    store.updateBot(bot.id, { listEnabled: true });

    expect(store.getBot(bot.id)?.listEnabled).toBe(true);
  });

  it("does not treat LIKE wildcards specially", () => {
    const store = open();
    const server = store.insertServer(serverRecord("alpha"));
    const channel = store.insertChannel({ serverId: server.id, name: "#one", password: null });
    const bot = store.insertBot({ channelId: channel.id, name: "xdcc", listEnabled: false });
    store.insertPack({ botId: bot.id, number: 1, fileName: "a_b.txt", fileSize: "1K" });
    store.insertPack({ botId: bot.id, number: 2, fileName: "axb.txt", fileSize: "1K" });
    store.insertPack({ botId: bot.id, number: 3, fileName: "A_B.txt", fileSize: "1K" });

    expect(store.searchPacks("a_b", { kind: "all" }).map((pack) => pack.number)).toEqual([1]);
  });
});
