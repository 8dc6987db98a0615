/**
 * Version information for vault-test-fixture
 *
 * Single source of truth for version number.
 * Import this instead of hardcoding version strings.
 */

// Keep in sync with package.json
export const VERSION = '0.1.0';
export const PACKAGE_NAME = 'vault-test-fixture';
export const USER_AGENT = `${PACKAGE_NAME}/${VERSION}`;
