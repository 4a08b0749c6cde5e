import { describe, it, expect } from "vitest";
import { buildAvailabilityView } from "../services/availability";
import { available, makeSteamAsset, unavailable } from "./helpers";

const hrsg1 = makeSteamAsset("hrsg1", { utilityId: "hrsg1-shp", linkedPowerAssetId: "gt1" });
const hrsg2 = makeSteamAsset("hrsg2", { utilityId: "hrsg2-shp", linkedPowerAssetId: "gt2", priority: 2 });
const prds = makeSteamAsset("lp-prds", {
  type: "PRDS",
  steamType: "LP",
  utilityId: "lp-prds",
  maxCapacity: 999999,
  isAlwaysAvailable: true,
  priority: 22,
});

describe("buildAvailabilityView", () => {
  it("mirrors the linked gas turbine for an HRSG", () => {
    const view = buildAvailabilityView({
      periodId: "FY2025-04",
      steamAssets: [hrsg1, hrsg2],
      records: [available("gt1", 696), unavailable("gt2")],
    });

    expect(view.isAvailable("hrsg1")).toBe(true);
    expect(view.operationalHours("hrsg1")).toBe(696);
    expect(view.isAvailable("hrsg2-shp")).toBe(false);
    expect(view.operationalHours("hrsg2")).toBe(0);
    expect(view.hasRecord("hrsg2")).toBe(true);
  });

  it("treats an asset without any record as unavailable", () => {
    const view = buildAvailabilityView({ periodId: "FY2025-04", steamAssets: [hrsg1], records: [] });

    expect(view.isAvailable("hrsg1")).toBe(false);
    expect(view.operationalHours("hrsg1")).toBe(0);
    expect(view.hasRecord("hrsg1")).toBe(false);
    expect(view.assetForUtility("hrsg1-shp")?.assetName).toBe("HRSG1");
  });

  it("keeps always-available assets on the default monthly hours", () => {
    const view = buildAvailabilityView({ periodId: "FY2025-04", steamAssets: [prds], records: [] });

    expect(view.isAvailable("lp-prds")).toBe(true);
    expect(view.operationalHours("lp-prds")).toBe(720);
    expect(view.hasRecord("lp-prds")).toBe(true);
  });

  it("lets an asset's own record override the default hours", () => {
    const view = buildAvailabilityView({
      periodId: "FY2025-02",
      steamAssets: [prds],
      records: [available("lp-prds", 672)],
      defaultOperationalHours: 744,
    });

    expect(view.operationalHours("lp-prds")).toBe(672);
  });

  it("reports power assets against their generation utility", () => {
    const view = buildAvailabilityView({
      periodId: "FY2025-04",
      steamAssets: [],
      powerAssets: [{ id: "gt2", name: "GT2", utilityId: "powergen-pp2" }],
      records: [unavailable("gt2")],
    });

    expect(view.isAvailable("powergen-pp2")).toBe(false);
    expect(view.assetForUtility("powergen-pp2")).toMatchObject({ assetId: "gt2", kind: "POWER" });
  });

  it("prefers the steam asset when a power asset maps to the same utility", () => {
    const view = buildAvailabilityView({
      periodId: "FY2025-04",
      steamAssets: [hrsg1],
      powerAssets: [{ id: "gt1", name: "GT1", utilityId: "hrsg1-shp" }],
      records: [available("gt1")],
    });

    expect(view.assetForUtility("hrsg1-shp")?.kind).toBe("STEAM");
  });

  it("treats utilities without a backing asset as available", () => {
    const view = buildAvailabilityView({ periodId: "FY2025-04", steamAssets: [hrsg1], records: [] });

    expect(view.isAvailable("power-from-mel")).toBe(true);
    expect(view.operationalHours("power-from-mel")).toBe(720);
    expect(view.assetForUtility("power-from-mel")).toBeUndefined();
  });

  it("returns a frozen view", () => {
    const view = buildAvailabilityView({ periodId: "FY2025-04", steamAssets: [hrsg1], records: [] });

    expect(Object.isFrozen(view)).toBe(true);
    expect(Object.isFrozen(view.assets)).toBe(true);
    expect(Object.isFrozen(view.assets[0])).toBe(true);
  });
});
