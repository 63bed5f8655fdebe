import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { EARTH_RADIUS_MILES, haversineMilesV1, isWithinRadiusV1 } from "../geo/haversine";

describe("haversineMilesV1", () => {
  it("is zero for the same point", () => {
    const p = { latitude: 40.8255, longitude: -74.3594 };
    assert.equal(haversineMilesV1(p, p), 0);
  });

  it("measures one degree of latitude as R * pi / 180", () => {
    const d = haversineMilesV1({ latitude: 0, longitude: 10 }, { latitude: 1, longitude: 10 });
    assert.ok(Math.abs(d - (EARTH_RADIUS_MILES * Math.PI) / 180) < 1e-9, `got ${d}`);
  });

  it("is symmetric", () => {
    const a = { latitude: 40.8255, longitude: -74.3594 };
    const b = { latitude: 40.9142, longitude: -73.125 };
    assert.ok(Math.abs(haversineMilesV1(a, b) - haversineMilesV1(b, a)) < 1e-9);
  });
});

describe("isWithinRadiusV1", () => {
  const site = { latitude: 40.8255, longitude: -74.3594 };
  const applicant = { latitude: 41.2, longitude: -74.0 };

  it("includes the boundary distance", () => {
    const d = haversineMilesV1(applicant, site);
    assert.equal(isWithinRadiusV1(applicant, site, d), true);
  });

  it("excludes anything past the radius", () => {
    const d = haversineMilesV1(applicant, site);
    assert.equal(isWithinRadiusV1(applicant, site, d - 1e-6), false);
  });
});
