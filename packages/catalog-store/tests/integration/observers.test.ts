import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { CatalogController } from "../../src/catalog-controller.js";
import {
  CatalogReentrancyError,
  ObserverError,
  ObserverRegistrationError,
  PreconditionError,
  ValidationError
} from "../../src/errors.js";
import { IgnoringObserver, type ServerDetails } from "../../src/observer.js";
import { createStoreFixture, RecordingObserver, silentLogger, type StoreFixture } from "./helpers.js";

const ALPHA: ServerDetails = {
  host: "alpha",
  port: 6667,
  nickName: "nick",
  userName: "nick",
  realName: "nick",
  authentication: "none",
  userPassword: null,
  password: null
};

describe("CatalogController observers", () => {
  let fixture: StoreFixture;
  let catalog: CatalogController;
  let observer: RecordingObserver;

  const addAlpha = (): void => {
    catalog.addServer({ host: "alpha", port: 6667, nickName: "nick", authentication: "none" });
  };

  beforeEach(() => {
    fixture = createStoreFixture("memory");
    catalog = new CatalogController(fixture.createStore(), { logger: silentLogger });
    observer = new RecordingObserver();
    catalog.addObserver(observer);
  });

  afterEach(() => {
    if (!catalog.isClosed()) {
      catalog.close();
    }
    fixture.cleanup();
  });

  describe("registration", () => {
    it("refuses the same observer twice", () => {
      expect(() => catalog.addObserver(observer)).toThrow(ObserverRegistrationError);
    });

    it("refuses to remove an observer that was never added", () => {
      expect(() => catalog.removeObserver(new RecordingObserver())).toThrow(ObserverRegistrationError);
    });

    it("stops notifying a removed observer", () => {
      catalog.removeObserver(observer);
      addAlpha();

      expect(observer.calls).toEqual([]);
    });
  });

  describe("creation events", () => {
    it("reports a new server followed by a flush", () => {
      addAlpha();

      expect(observer.calls).toEqual([
        { method: "serverAdded", args: [ALPHA] },
        { method: "flushed", args: [] }
      ]);
    });

    it("reports channel and bot details", () => {
      addAlpha();
      observer.calls.length = 0;

      catalog.addChannel("alpha", "#one", "chan-secret");
      catalog.addBot("alpha", "#one", "xdcc", true);

      expect(observer.calls).toEqual([
        { method: "channelAdded", args: ["alpha", "#one", "chan-secret"] },
        { method: "flushed", args: [] },
        { method: "botAdded", args: ["alpha", "#one", "xdcc", true] },
        { method: "flushed", args: [] }
      ]);
    });

    it("reports an introduced bot before its first pack, in one flush", () => {
      addAlpha();
      catalog.addChannel("alpha", "#one");
      observer.calls.length = 0;

      catalog.updateOrAddPack("alpha", "#one", "xdcc", 1, "a.bin", "1G", true);

      expect(observer.calls).toEqual([
        { method: "botAdded", args: ["alpha", "#one", "xdcc", false] },
        { method: "packAdded", args: ["alpha", "#one", "xdcc", 1, "a.bin", "1G"] },
        { method: "flushed", args: [] }
      ]);
    });

    it("reports a pack overwrite with old and new values", () => {
      addAlpha();
      catalog.addChannel("alpha", "#one");
      catalog.updateOrAddPack("alpha", "#one", "xdcc", 1, "a.bin", "1G", true);
      observer.calls.length = 0;

      catalog.updateOrAddPack("alpha", "#one", "xdcc", 1, "b.bin", "2G", false);

      expect(observer.calls).toEqual([
        {
          method: "packUpdated",
          args: [
            "alpha",
            "#one",
            "xdcc",
            1,
            { oldValue: "a.bin", newValue: "b.bin" },
            { oldValue: "1G", newValue: "2G" }
          ]
        },
        { method: "flushed", args: [] }
      ]);
    });
  });

  describe("update events", () => {
    beforeEach(() => {
      addAlpha();
      catalog.addChannel("alpha", "#one");
      catalog.addChannel("alpha", "#two");
      catalog.addBot("alpha", "#one", "xdcc", true);
      observer.calls.length = 0;
    });

    it("reports identity changes as whole values", () => {
      catalog.setServerIdentity("alpha", { nickName: "fresh", realName: "Fresh Bot", authentication: "none" });

      expect(observer.calls[0]).toEqual({
        method: "serverIdentityChanged",
        args: [
          "alpha",
          {
            oldValue: { nickName: "nick", userName: "nick", realName: "nick", authentication: "none", userPassword: null },
            newValue: {
              nickName: "fresh",
              userName: "fresh",
              realName: "Fresh Bot",
              authentication: "none",
              userPassword: null
            }
          }
        ]
      });
    });

    it("reports port, password and list flag changes", () => {
      catalog.setServerPort("alpha", 7000);
      catalog.setServerPassword("alpha", "server-secret");
      catalog.setChannelPassword("alpha", "#one", "chan-secret");
      catalog.setBotListEnabled("alpha", "#one", "xdcc", false);

      expect(observer.calls.filter((call) => call.method !== "flushed")).toEqual([
        { method: "serverPortChanged", args: ["alpha", { oldValue: 6667, newValue: 7000 }] },
        { method: "serverPasswordChanged", args: ["alpha", { oldValue: null, newValue: "server-secret" }] },
        { method: "channelPasswordChanged", args: ["alpha", "#one", { oldValue: null, newValue: "chan-secret" }] },
        { method: "botListFlagChanged", args: ["alpha", "#one", "xdcc", { oldValue: true, newValue: false }] }
      ]);
      expect(observer.methods.filter((method) => method === "flushed")).toHaveLength(4);
    });

    it("reports a moved bot", () => {
      catalog.setBotChannel("alpha", "#one", "#two", "xdcc");

      expect(observer.calls).toEqual([
        { method: "botMoved", args: ["alpha", "#one", "#two", "xdcc"] },
        { method: "flushed", args: [] }
      ]);
    });

    it("stays silent when nothing changed", () => {
      expect(catalog.setServerPort("beta", 7000)).toBe(false);
      expect(catalog.setBotChannel("alpha", "#one", "#two", "nobody")).toBe(false);
      expect(catalog.deleteBot("alpha", "#one", "nobody")).toBe(false);
      expect(() => catalog.addChannel("alpha", "#one")).toThrow(PreconditionError);
      expect(() => catalog.addChannel("alpha", "one")).toThrow(ValidationError);

      expect(observer.calls).toEqual([]);
    });
  });

  describe("deletion events", () => {
    it("reports every removed record, descendants first", () => {
      addAlpha();
      catalog.addChannel("alpha", "#one");
      catalog.addChannel("alpha", "#two");
      catalog.updateOrAddPack("alpha", "#one", "xdcc", 1, "a.bin", "1G", true);
      catalog.updateOrAddPack("alpha", "#one", "xdcc", 2, "b.bin", "2G", true);
      catalog.updateOrAddPack("alpha", "#two", "other", 1, "c.bin", "3G", true);
      observer.calls.length = 0;

      catalog.deleteServer("alpha");

      expect(observer.calls).toEqual([
        { method: "packDeleted", args: ["alpha", "#one", "xdcc", 1, "a.bin", "1G"] },
        { method: "packDeleted", args: ["alpha", "#one", "xdcc", 2, "b.bin", "2G"] },
        { method: "botDeleted", args: ["alpha", "#one", "xdcc", false] },
        { method: "channelDeleted", args: ["alpha", "#one", null] },
        { method: "packDeleted", args: ["alpha", "#two", "other", 1, "c.bin", "3G"] },
        { method: "botDeleted", args: ["alpha", "#two", "other", false] },
        { method: "channelDeleted", args: ["alpha", "#two", null] },
        { method: "serverDeleted", args: [ALPHA] },
        { method: "flushed", args: [] }
      ]);
    });

    it("reports a single pack removal", () => {
      addAlpha();
      catalog.addChannel("alpha", "#one");
      catalog.updateOrAddPack("alpha", "#one", "xdcc", 1, "a.bin", "1G", true);
      observer.calls.length = 0;

      catalog.deletePack("alpha", "#one", "xdcc", 1);

      expect(observer.methods).toEqual(["packDeleted", "flushed"]);
    });
  });

  describe("delivery", () => {
    it("notifies once the change is visible to other connections", () => {
      const sqlite = createStoreFixture("sqlite");
      const writer = new CatalogController(sqlite.createStore(), { logger: silentLogger });
      const reader = new CatalogController(sqlite.createStore(), { logger: silentLogger });
      const seenPorts: Array<number | undefined> = [];

      class PortProbe extends IgnoringObserver {
        public override serverAdded(server: ServerDetails): void {
          seenPorts.push(reader.getServer(server.host)?.port);
        }
      }

      try {
        writer.addObserver(new PortProbe());
        writer.addServer({ host: "alpha", port: 6667, nickName: "nick", authentication: "none" });

        expect(seenPorts).toEqual([6667]);
      } finally {
        writer.close();
        reader.close();
        sqlite.cleanup();
      }
    });

    it("rejects calls back into the controller from a callback", () => {
      const failures: unknown[] = [];

      class Reentrant extends IgnoringObserver {
        public override serverAdded(server: ServerDetails): void {
          try {
            catalog.getServer(server.host);
          } catch (error) {
            failures.push(error);
            throw error;
          }
        }
      }
      catalog.addObserver(new Reentrant());

      expect(() => addAlpha()).toThrow(ObserverError);
      expect(failures).toHaveLength(1);
      expect(failures[0]).toBeInstanceOf(CatalogReentrancyError);
      expect(catalog.getServer("alpha")?.port).toBe(6667);
    });

    it("keeps notifying the other observers when one throws", () => {
      class Failing extends IgnoringObserver {
        public override serverAdded(): void {
          throw new Error("observer exploded");
        }
      }
      catalog.removeObserver(observer);
      catalog.addObserver(new Failing());
      catalog.addObserver(observer);

      let caught: unknown;
      try {
        addAlpha();
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ObserverError);
      expect(caught instanceof ObserverError ? caught.failures : []).toHaveLength(1);
      expect(observer.methods).toEqual(["serverAdded", "flushed"]);
      expect(catalog.getServer("alpha")).not.toBeNull();
    });

    it("announces close", () => {
      catalog.close();

      expect(observer.methods).toEqual(["closed"]);
    });
  });
});
