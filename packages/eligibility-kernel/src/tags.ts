// Classification tags produced by the evaluator and the intake flow.

export const TAG_TOO_FAR = "Too far";
export const TAG_LOCATION_UNKNOWN = "Location unknown";
export const TAG_LEFT_HANDED = "Left-handed";
export const TAG_DUPLICATE = "Duplicate";
