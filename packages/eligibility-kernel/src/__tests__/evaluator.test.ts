import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { haversineMilesV1 } from "../geo/haversine";
import { evaluateEligibilityV1, screenApplicantV1 } from "../kernel";
import type {
  AgeRuleV1,
  ComparisonRuleV1,
  CompositeRuleV1,
  DistanceRuleV1,
  EligibilityRuleV1,
  GeoTargetV1
} from "../ruleset/types";

const SITE: GeoTargetV1 = { latitude: 40.8255, longitude: -74.3594, radius_miles: 50 };
const NEARBY = { latitude: 40.7357, longitude: -74.1724 };

function equalsRule(field: string, value: string, message: string): ComparisonRuleV1 {
  return { type: "comparison", field, operator: "equals", value, disqual_message: message };
}

const ageRule: AgeRuleV1 = { type: "age", minimum: 18, disqual_message: "you are under 18 years old" };
const distanceRule: DistanceRuleV1 = {
  type: "distance",
  target: SITE,
  disqual_message: "you are located outside the eligible distance from our research site"
};

const screeningRules: EligibilityRuleV1[] = [
  ageRule,
  distanceRule,
  equalsRule("tbi_year", "Yes", "you have not experienced a TBI at least one year ago"),
  equalsRule("memory_issues", "Yes", "you do not have persistent memory problems"),
  equalsRule("english_fluent", "Yes", "you are not fluent in English"),
  equalsRule("can_exercise", "Yes", "you are not willing or able to exercise"),
  equalsRule("can_mri", "Yes", "you are not able to undergo an MRI")
];

const kidneyComposite: CompositeRuleV1 = {
  type: "composite",
  rule_id: "ckd_gfr_complex",
  disqual_message: "you do not meet the kidney function criteria",
  sub_rules: [
    { type: "comparison", field: "ckd_gfr", operator: "equals", value: "Yes", disqual_message: "you do not have CKD" },
    {
      type: "comparison",
      field: "kidney_transplant_6months",
      operator: "equals",
      value: "Yes",
      disqual_message: "your kidney transplant has not been at least 6 months ago",
      condition: { controlling_field: "ckd_gfr", required_value: "Yes", skip_value: "Not Applicable" }
    },
    {
      type: "comparison",
      field: "gfr_less_45",
      operator: "equals",
      value: "Yes",
      disqual_message: "your most recent kidney filtration rate (GFR) is not less than 45",
      condition: { controlling_field: "ckd_gfr", required_value: "Yes" }
    }
  ]
};

function recordingLogger(): { warn(obj: object, msg: string): void; calls: Array<{ obj: object; msg: string }> } {
  const calls: Array<{ obj: object; msg: string }> = [];
  return {
    calls,
    warn(obj: object, msg: string): void {
      calls.push({ obj, msg });
    }
  };
}

describe("evaluateEligibilityV1", () => {
  it("qualifies with no rules and only tags handedness", () => {
    const v = evaluateEligibilityV1([], { handedness: "Left-handed" }, {});
    assert.deepEqual(v, { qualified: true, reasons: [], tags: ["Left-handed"] });
  });

  it("qualifies when every rule is satisfied", () => {
    const answers = { tbi_year: "Yes", memory_issues: "Yes", english_fluent: "Yes", can_exercise: "Yes", can_mri: "Yes" };
    const v = evaluateEligibilityV1(screeningRules, answers, { age: 30, coords: NEARBY });
    assert.deepEqual(v, { qualified: true, reasons: [], tags: [] });
  });

  it("lists reasons in declaration order without duplicates", () => {
    const rules: EligibilityRuleV1[] = [
      equalsRule("a", "Yes", "first"),
      equalsRule("b", "Yes", "second"),
      equalsRule("c", "Yes", "first")
    ];
    const v = evaluateEligibilityV1(rules, { a: "No", b: "No", c: "No" }, {});
    assert.deepEqual(v.reasons, ["first", "second"]);
    assert.equal(v.qualified, false);
  });

  it("supports not_equals and in_list", () => {
    const rules: EligibilityRuleV1[] = [
      { type: "comparison", field: "dialysis", operator: "not_equals", value: "Yes", disqual_message: "on dialysis" },
      { type: "comparison", field: "stage", operator: "in_list", value: ["3b", "4", "5"], disqual_message: "wrong stage" }
    ];
    assert.equal(evaluateEligibilityV1(rules, { dialysis: "No", stage: "4" }, {}).qualified, true);
    assert.deepEqual(evaluateEligibilityV1(rules, { dialysis: "Yes", stage: "2" }, {}).reasons, [
      "on dialysis",
      "wrong stage"
    ]);
  });

  it("treats a missing answer as not equal", () => {
    const v = evaluateEligibilityV1([equalsRule("tbi_year", "Yes", "no tbi")], {}, {});
    assert.deepEqual(v.reasons, ["no tbi"]);
  });

  describe("conditional rules", () => {
    const gfrRule: ComparisonRuleV1 = {
      ...equalsRule("gfr_less_45", "Yes", "gfr too high"),
      condition: { controlling_field: "ckd_gfr", required_value: "Yes" }
    };

    it("never disqualify when the controlling field does not match", () => {
      for (const controlling of ["No", "", undefined]) {
        const answers: Record<string, string> = { gfr_less_45: "No" };
        if (controlling !== undefined) answers.ckd_gfr = controlling;
        const v = evaluateEligibilityV1([gfrRule], answers, {});
        assert.equal(v.qualified, true, `controlling=${String(controlling)}`);
      }
    });

    it("apply when the controlling field matches", () => {
      const v = evaluateEligibilityV1([gfrRule], { ckd_gfr: "Yes", gfr_less_45: "No" }, {});
      assert.deepEqual(v.reasons, ["gfr too high"]);
    });

    it("are skipped when the own field holds the skip value", () => {
      const rule: ComparisonRuleV1 = {
        ...equalsRule("kidney_transplant_6months", "Yes", "too recent"),
        condition: { controlling_field: "ckd_gfr", required_value: "Yes", skip_value: "Not Applicable" }
      };
      const skipped = evaluateEligibilityV1([rule], { ckd_gfr: "Yes", kidney_transplant_6months: "Not Applicable" }, {});
      assert.equal(skipped.qualified, true);
      const applied = evaluateEligibilityV1([rule], { ckd_gfr: "Yes", kidney_transplant_6months: "No" }, {});
      assert.deepEqual(applied.reasons, ["too recent"]);
    });
  });

  describe("age rules", () => {
    it("accept the minimum age", () => {
      assert.equal(evaluateEligibilityV1([ageRule], {}, { age: 18 }).qualified, true);
    });

    it("reject below the minimum or without an age", () => {
      for (const age of [17, null, undefined]) {
        const v = evaluateEligibilityV1([ageRule], {}, { age });
        assert.deepEqual(v.reasons, ["you are under 18 years old"], `age=${String(age)}`);
      }
    });
  });

  describe("distance rules", () => {
    it("qualify exactly at the radius", () => {
      const applicant = { latitude: 41.2, longitude: -74.0 };
      const target = { ...SITE, radius_miles: haversineMilesV1(applicant, SITE) };
      const v = evaluateEligibilityV1([{ ...distanceRule, target }], {}, { coords: applicant });
      assert.deepEqual(v, { qualified: true, reasons: [], tags: [] });
    });

    it("tag Too far past the radius", () => {
      const v = evaluateEligibilityV1([distanceRule], {}, { coords: { latitude: 42.3601, longitude: -71.0589 } });
      assert.deepEqual(v, {
        qualified: false,
        reasons: ["you are located outside the eligible distance from our research site"],
        tags: ["Too far"]
      });
    });

    it("disqualify with Location unknown when coordinates are missing", () => {
      const v = evaluateEligibilityV1([distanceRule], {}, { coords: null });
      assert.equal(v.qualified, false);
      assert.deepEqual(v.reasons, ["you are located outside the eligible distance from our research site"]);
      assert.deepEqual(v.tags, ["Location unknown"]);
    });

    it("emit each tag once", () => {
      const second: DistanceRuleV1 = { ...distanceRule, disqual_message: "too far from the second site" };
      const v = evaluateEligibilityV1([distanceRule, second], {}, { coords: null });
      assert.deepEqual(v.tags, ["Location unknown"]);
      assert.equal(v.reasons.length, 2);
    });
  });

  describe("composite rules", () => {
    it("collect every failing sub-rule message", () => {
      const v = evaluateEligibilityV1([kidneyComposite], { ckd_gfr: "Yes", kidney_transplant_6months: "No", gfr_less_45: "No" }, {});
      assert.deepEqual(v.reasons, [
        "your kidney transplant has not been at least 6 months ago",
        "your most recent kidney filtration rate (GFR) is not less than 45"
      ]);
    });

    it("skip conditional sub-rules whose guard does not hold", () => {
      const v = evaluateEligibilityV1([kidneyComposite], { ckd_gfr: "No", kidney_transplant_6months: "No", gfr_less_45: "No" }, {});
      assert.deepEqual(v.reasons, ["you do not have CKD"]);
    });

    it("fall back to the composite message when sub-rules carry none", () => {
      const bare: CompositeRuleV1 = {
        ...kidneyComposite,
        sub_rules: kidneyComposite.sub_rules.map(({ disqual_message: _omit, ...sub }) => sub)
      };
      const v = evaluateEligibilityV1([bare], { ckd_gfr: "Yes", kidney_transplant_6months: "Yes", gfr_less_45: "No" }, {});
      assert.deepEqual(v.reasons, ["you do not meet the kidney function criteria"]);
    });

    it("are satisfied when all sub-rules are", () => {
      const v = evaluateEligibilityV1(
        [kidneyComposite],
        { ckd_gfr: "Yes", kidney_transplant_6months: "Not Applicable", gfr_less_45: "Yes" },
        {}
      );
      assert.equal(v.qualified, true);
    });
  });

  it("skips unrecognized rule kinds with a warning", () => {
    const logger = recordingLogger();
    const rules: EligibilityRuleV1[] = [{ type: "unrecognized", rule_id: "r9", declared_type: "bmi" }];
    const v = evaluateEligibilityV1(rules, {}, {}, { logger });
    assert.deepEqual(v, { qualified: true, reasons: [], tags: [] });
    assert.equal(logger.calls.length, 1);
    assert.equal(logger.calls[0].msg, "UNRECOGNIZED_RULE_KIND: skipped");
    assert.deepEqual(logger.calls[0].obj, { rule_index: 0, rule_id: "r9", declared_type: "bmi" });
  });

  it("returns a frozen verdict", () => {
    const v = evaluateEligibilityV1([equalsRule("a", "Yes", "nope")], {}, {});
    assert.ok(Object.isFrozen(v));
    assert.ok(Object.isFrozen(v.reasons));
    assert.ok(Object.isFrozen(v.tags));
  });
});

describe("screenApplicantV1", () => {
  const raw = {
    tbi_year: "yes",
    memory_issues: "Yes",
    english_fluent: "Y",
    can_exercise: "No",
    can_mri: "Yes",
    handedness: "left",
    dob: "01/15/2000"
  };

  it("disqualifies on a normalized No and tags left-handedness", () => {
    const { answers, verdict } = screenApplicantV1(screeningRules, raw, { age: 26, coords: NEARBY });
    assert.equal(answers.english_fluent, "Yes");
    assert.deepEqual(verdict, {
      qualified: false,
      reasons: ["you are not willing or able to exercise"],
      tags: ["Left-handed"]
    });
  });

  it("qualifies once the applicant can exercise", () => {
    const { verdict } = screenApplicantV1(screeningRules, { ...raw, can_exercise: "Yes" }, { age: 26, coords: NEARBY });
    assert.deepEqual(verdict, { qualified: true, reasons: [], tags: ["Left-handed"] });
  });
});
