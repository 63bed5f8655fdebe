import assert from "node:assert/strict";
import { describe, it } from "node:test";

import {
  REJECT_DOB,
  REJECT_EMAIL,
  REJECT_LOCATION,
  REJECT_PHONE,
  formatUsPhoneNumber,
  isUsPhoneNumber,
  validateSubmissionV1
} from "../validation/submission";
import { NOW } from "./fakes";

const valid = {
  email: "jane@example.com",
  phone: "+1 (555) 123-4567",
  dob: "01/15/1990",
  city_state: " Newark, NJ "
};

describe("US phone numbers", () => {
  it("formats ten digits with separators", () => {
    assert.equal(formatUsPhoneNumber("(555) 123-4567"), "+15551234567");
    assert.equal(formatUsPhoneNumber("555.123.4567"), "+15551234567");
  });

  it("accepts a leading country code", () => {
    assert.equal(formatUsPhoneNumber("15551234567"), "+15551234567");
    assert.equal(formatUsPhoneNumber("+1 555 123 4567"), "+15551234567");
  });

  it("rejects other lengths and letters", () => {
    assert.equal(isUsPhoneNumber("555-123-456"), false);
    assert.equal(isUsPhoneNumber("25551234567"), false);
    assert.equal(isUsPhoneNumber("555-CALL-NOW"), false);
    assert.equal(formatUsPhoneNumber(""), null);
  });
});

describe("validateSubmissionV1", () => {
  it("returns the checked values", () => {
    const r = validateSubmissionV1(valid, NOW);
    assert.deepEqual(r, {
      ok: true,
      value: {
        email: "jane@example.com",
        phone_e164: "+15551234567",
        dob: { year: 1990, month: 1, day: 15 },
        age: 36,
        city_state: "Newark, NJ"
      }
    });
  });

  it("checks email first", () => {
    assert.deepEqual(validateSubmissionV1({ ...valid, email: "jane.example.com", phone: "12" }, NOW), {
      ok: false,
      reason: REJECT_EMAIL
    });
  });

  it("rejects a malformed phone", () => {
    assert.deepEqual(validateSubmissionV1({ ...valid, phone: "555-1234" }, NOW), { ok: false, reason: REJECT_PHONE });
  });

  it("rejects dates of birth in another shape or that do not exist", () => {
    assert.deepEqual(validateSubmissionV1({ ...valid, dob: "1990-01-15" }, NOW), { ok: false, reason: REJECT_DOB });
    assert.deepEqual(validateSubmissionV1({ ...valid, dob: "02/30/1990" }, NOW), { ok: false, reason: REJECT_DOB });
  });

  it("rejects a blank location", () => {
    assert.deepEqual(validateSubmissionV1({ ...valid, city_state: "   " }, NOW), { ok: false, reason: REJECT_LOCATION });
    const withoutLocation = { email: valid.email, phone: valid.phone, dob: valid.dob };
    assert.deepEqual(validateSubmissionV1(withoutLocation, NOW), { ok: false, reason: REJECT_LOCATION });
  });

  it("computes age to the day", () => {
    const turning18Today = validateSubmissionV1({ ...valid, dob: "10/19/2008" }, NOW);
    const turning18Tomorrow = validateSubmissionV1({ ...valid, dob: "10/20/2008" }, NOW);
    assert.equal(turning18Today.ok && turning18Today.value.age, 18);
    assert.equal(turning18Tomorrow.ok && turning18Tomorrow.value.age, 17);
  });
});
