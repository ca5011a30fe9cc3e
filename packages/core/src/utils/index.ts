/**
 * @fileoverview Utils Module
 */

export * from './text-wrap.js';
