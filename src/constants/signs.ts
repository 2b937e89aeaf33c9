/**
 * Sign registry constants
 */

/**
 * Default path of the sign configuration, relative to cwd.
 * Overridden by SIGNS_PATH.
 */
export const SIGNS_PATH = "data/signs.json";

/**
 * Placeholder replaced by the numeric pattern in salary templates
 */
export const NUMERIC_PATTERN_PLACEHOLDER = "{numeric_pattern}";

/**
 * Signs wrapped in slashes are regex fragments; anything else is a literal
 */
export const REGEX_SIGN_DELIMITER = "/";
