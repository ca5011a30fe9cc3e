/**
 * @fileoverview Package constants
 *
 * Centralized constants to avoid circular dependencies when importing from index.ts
 */

export const VERSION = '0.1.0';
export const NAME = 'rudder';
