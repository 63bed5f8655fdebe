export * from "./schema/applicant_fields_v1";
export * from "./schema/eligibility_verdict_v1"; // EligibilityVerdict v1: kernel output, session payload
export * from "./schema/verification_session_v1";
export * from "./schema/submission_outcome_v1";
export * from "./schema/intake_requests_v1";
