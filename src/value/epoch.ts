/** Core Foundation absolute time starts at 2001-01-01T00:00:00Z. */
export const cfAbsoluteTimeEpochMilliseconds = Date.UTC(2001, 0, 1);
