/** number of milliseconds in a second */
export const MS_PER_SECOND = 1000;
/** number of seconds in a minute */
export const SECONDS_PER_MINUTE = 60;
/** number of minutes in an hour */
export const MINUTES_PER_HOUR = 60;

/** one minute in milliseconds */
export const MINUTES_TO_MS = SECONDS_PER_MINUTE * MS_PER_SECOND;
/** one hour in seconds */
export const HOUR_IN_SECONDS = MINUTES_PER_HOUR * SECONDS_PER_MINUTE;

/** a token with less remaining life than this is treated as expired */
export const MINIMUM_VALIDITY_MS = 5 * MINUTES_TO_MS;
/** a token with less remaining life than this is refreshed in the background */
export const REFRESH_MARGIN_MS = MINIMUM_VALIDITY_MS + MINUTES_TO_MS;
