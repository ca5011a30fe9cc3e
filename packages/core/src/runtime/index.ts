/**
 * @fileoverview Runtime exports
 */

export {
  createContext,
  type RuntimeContext,
  type RuntimeContextConfig,
} from './context.js';
