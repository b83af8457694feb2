import { promises as fs } from "fs";
import { DataFormatError, NotFoundError, ValidationError } from "../common/errors";
import { PlanType } from "../common/common-enum";
import { GymInput } from "../types/model/gym.model";
import { createTempWorkspace, fixedClock, TempWorkspace } from "../../test/helpers/tempFiles";
import { CatalogStore } from "./catalogStore.service";

const HEADER =
  "PartnerName,GymName,Address,Pincode,Latitude,Longitude,SubscriptionAmount,Amenities";

const newGym = (overrides: Partial<GymInput> = {}): GymInput => ({
  partnerName: "Cult",
  gymName: "Cult Juhu",
  address: "7 Beach Road, Juhu, Mumbai",
  pincode: "400049",
  latitude: 19.1075,
  longitude: 72.8263,
  subscriptionAmount: 2299,
  amenities: ["Cardio", "Weights"],
  ...overrides,
});

describe("CatalogStore", () => {
  let workspace: TempWorkspace;
  let store: CatalogStore;

  beforeEach(async () => {
    workspace = await createTempWorkspace();
    store = new CatalogStore({
      csvPath: workspace.csvPath,
      now: fixedClock("2026-10-19T08:30:15.123Z"),
    });
    await store.load();
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  describe("load", () => {
    it("loads every fixture row with row-order ids", () => {
      expect(store.size).toBe(30);
      const gyms = store.listAll();
      expect(gyms.map((gym) => gym.id)).toEqual(Array.from({ length: 30 }, (_, i) => i + 1));
      expect(gyms[0]).toEqual({
        id: 1,
        partnerName: "Cult",
        gymName: "Cult Andheri East",
        address: "10 Station Road, Andheri East, Mumbai",
        pincode: "400069",
        latitude: 19.1147,
        longitude: 72.8706,
        subscriptionAmount: 2499,
        amenities: ["Cardio", "Weights", "Showers"],
      });
    });

    it("skips rows that break a field rule and keeps the rest", async () => {
      await fs.writeFile(
        workspace.csvPath,
        `${HEADER}\n` +
          "Cult,Good One,Addr 1,400069,19.1,72.8,2499,Yoga\n" +
          "Cult,Bad Latitude,Addr 2,400069,95,72.8,2499,Yoga\n" +
          "Cult,Bad Pincode,Addr 3,40006X,19.1,72.8,2499,Yoga\n" +
          "Cult,Good Two,Addr 4,400069,19.2,72.9,1999,Yoga\n"
      );

      await expect(store.load()).resolves.toBe(2);
      expect(store.listAll().map((gym) => [gym.id, gym.gymName])).toEqual([
        [1, "Good One"],
        [4, "Good Two"],
      ]);
    });

    it("fails on missing columns", async () => {
      await fs.writeFile(workspace.csvPath, "PartnerName,GymName\nCult,A\n");
      await expect(store.load()).rejects.toBeInstanceOf(DataFormatError);
    });

    it("starts empty when the file does not exist", async () => {
      await fs.rm(workspace.csvPath);
      await expect(store.load()).resolves.toBe(0);
      expect(store.listAll()).toEqual([]);
    });
  });

  describe("listPartners", () => {
    it("counts six gyms for each of the five partners in first-seen order", () => {
      expect(store.listPartners()).toEqual([
        { name: "Cult", count: 6 },
        { name: "Gold's Gym", count: 6 },
        { name: "Anytime Fitness", count: 6 },
        { name: "Snap Fitness", count: 6 },
        { name: "Talwalkars", count: 6 },
      ]);
    });
  });

  describe("filterByPartner", () => {
    it("matches the partner name exactly", () => {
      const gyms = store.filterByPartner("Snap Fitness");
      expect(gyms).toHaveLength(6);
      expect(gyms.every((gym) => gym.partnerName === "Snap Fitness")).toBe(true);
    });

    it("is case-sensitive", () => {
      expect(store.filterByPartner("cult")).toEqual([]);
    });

    it("returns everything for an empty name", () => {
      expect(store.filterByPartner("")).toHaveLength(30);
      expect(store.filterByPartner()).toHaveLength(30);
    });

    it("returns copies that cannot change the catalog", () => {
      const [first] = store.filterByPartner("Cult");
      first.amenities.push("Helipad");
      first.gymName = "Renamed";
      expect(store.getById(1).gymName).toBe("Cult Andheri East");
      expect(store.getById(1).amenities).toEqual(["Cardio", "Weights", "Showers"]);
    });
  });

  describe("findNearby", () => {
    it("orders Cult gyms by distance from Andheri", () => {
      const gyms = store.findNearby({
        latitude: 19.1136,
        longitude: 72.8697,
        partner: "Cult",
        limit: 10,
      });

      expect(gyms.map((gym) => gym.gymName)).toEqual([
        "Cult Andheri East",
        "Cult Powai",
        "Cult Bandra West",
        "Cult Lower Parel",
        "Cult Vashi",
        "Cult Thane West",
      ]);
      expect(gyms[0].distance).toBe(0.15);
      for (let i = 1; i < gyms.length; i++) {
        expect(gyms[i].distance).toBeGreaterThanOrEqual(gyms[i - 1].distance);
      }
    });

    it("applies the limit across partners", () => {
      const gyms = store.findNearby({ latitude: 19.1136, longitude: 72.8697, limit: 3 });
      expect(gyms.map((gym) => gym.id)).toEqual([1, 7, 13]);
    });

    it("keeps catalog order for equal distances", async () => {
      await store.replaceAll([
        newGym({ gymName: "First" }),
        newGym({ gymName: "Second", partnerName: "Talwalkars" }),
        newGym({ gymName: "Third" }),
      ]);

      const gyms = store.findNearby({ latitude: 19.0, longitude: 72.8, limit: 10 });
      expect(gyms.map((gym) => gym.gymName)).toEqual(["First", "Second", "Third"]);
      expect(new Set(gyms.map((gym) => gym.distance)).size).toBe(1);
    });

    it("returns nothing for a non-positive limit or unknown partner", () => {
      expect(store.findNearby({ latitude: 19, longitude: 72, limit: 0 })).toEqual([]);
      expect(
        store.findNearby({ latitude: 19, longitude: 72, partner: "Nobody", limit: 5 })
      ).toEqual([]);
    });
  });

  describe("getById / getDetails", () => {
    it("throws NotFoundError for an unknown id", () => {
      expect(() => store.getById(999)).toThrow(NotFoundError);
      expect(() => store.getDetails(999)).toThrow("Gym 999 not found");
    });

    it("attaches subscription plans to the details", () => {
      const details = store.getDetails(1);
      expect(details.gymName).toBe("Cult Andheri East");
      expect(details.subscriptionPlans[PlanType.THREE_MONTH].total).toBe(6972);
      expect(details.subscriptionPlans[PlanType.TWELVE_MONTH].total).toBe(24890);
    });
  });

  describe("addRecord", () => {
    it("assigns the next id and round-trips through getById", async () => {
      const input = newGym();
      const added = await store.addRecord(input);

      expect(added.id).toBe(31);
      expect(store.getById(31)).toEqual({ id: 31, ...input });
    });

    it("persists the new gym to the backing file", async () => {
      await store.addRecord(newGym());

      const reloaded = new CatalogStore({ csvPath: workspace.csvPath });
      await reloaded.load();
      expect(reloaded.size).toBe(31);
      expect(reloaded.getById(31).gymName).toBe("Cult Juhu");
    });

    it("lists every violated field", async () => {
      const attempt = store.addRecord({
        ...newGym(),
        gymName: "  ",
        pincode: "4000",
        latitude: 91,
        longitude: -181,
        subscriptionAmount: 0,
      });

      await expect(attempt).rejects.toBeInstanceOf(ValidationError);
      const error = await attempt.catch((e: unknown) => e);
      expect(error instanceof ValidationError && error.issues.map((i) => i.field)).toEqual([
        "gymName",
        "pincode",
        "latitude",
        "longitude",
        "subscriptionAmount",
      ]);
      expect(store.size).toBe(30);
    });

    it("serializes concurrent additions", async () => {
      const added = await Promise.all([
        store.addRecord(newGym({ gymName: "A" })),
        store.addRecord(newGym({ gymName: "B" })),
        store.addRecord(newGym({ gymName: "C" })),
      ]);
      expect(added.map((gym) => gym.id)).toEqual([31, 32, 33]);

      const reloaded = new CatalogStore({ csvPath: workspace.csvPath });
      await reloaded.load();
      expect(reloaded.size).toBe(33);
    });
  });

  describe("deleteById", () => {
    it("removes exactly one gym", async () => {
      const removed = await store.deleteById(5);

      expect(removed.id).toBe(5);
      expect(store.size).toBe(29);
      expect(() => store.getById(5)).toThrow(NotFoundError);
      expect(store.getById(6).id).toBe(6);
    });

    it("throws NotFoundError and writes nothing for an unknown id", async () => {
      const before = await fs.readFile(workspace.csvPath, "utf8");
      await expect(store.deleteById(999)).rejects.toBeInstanceOf(NotFoundError);
      expect(await fs.readFile(workspace.csvPath, "utf8")).toBe(before);
    });
  });

  describe("replaceAll", () => {
    it("leaves the catalog untouched when any record is invalid", async () => {
      const before = store.listAll();
      const fileBefore = await fs.readFile(workspace.csvPath, "utf8");

      const attempt = store.replaceAll([newGym(), newGym({ latitude: 100 }), newGym()]);

      await expect(attempt).rejects.toThrow("records[1].latitude");
      expect(store.listAll()).toEqual(before);
      expect(await fs.readFile(workspace.csvPath, "utf8")).toBe(fileBefore);
    });

    it("rejects an empty or non-list input", async () => {
      await expect(store.replaceAll([])).rejects.toBeInstanceOf(ValidationError);
      await expect(store.replaceAll("gyms")).rejects.toBeInstanceOf(ValidationError);
    });

    it("renumbers the new catalog and backs up the old file", async () => {
      const fileBefore = await fs.readFile(workspace.csvPath, "utf8");

      const count = await store.replaceAll([
        newGym({ gymName: "Only One" }),
        newGym({ gymName: "Only Two" }),
      ]);

      expect(count).toBe(2);
      expect(store.listAll().map((gym) => [gym.id, gym.gymName])).toEqual([
        [1, "Only One"],
        [2, "Only Two"],
      ]);
      const backup = `${workspace.csvPath}.20261019T083015Z.backup`;
      expect(await fs.readFile(backup, "utf8")).toBe(fileBefore);
    });

    it("skips the backup when disabled", async () => {
      const noBackup = new CatalogStore({ csvPath: workspace.csvPath, backupOnReplace: false });
      await noBackup.load();
      await noBackup.replaceAll([newGym()]);

      const files = await fs.readdir(workspace.dir);
      expect(files.filter((name) => name.endsWith(".backup"))).toEqual([]);
    });
  });

  describe("stats", () => {
    it("reports gym and partner counts", () => {
      expect(store.stats()).toEqual({ gyms: 30, partners: 5 });
    });
  });
});
