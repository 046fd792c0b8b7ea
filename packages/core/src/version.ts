/**
 * Package version, printed by `audioshelf --version`.
 */

export const VERSION = '2026.10.19';
