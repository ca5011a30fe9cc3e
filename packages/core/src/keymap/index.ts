/**
 * @fileoverview Key Binding Map contract
 *
 * The terminal UI owns key bindings; commands only enumerate them.
 */

export interface KeyBinding {
  /** Key or key sequence, e.g. "ctrl-l" or "f a" */
  key: string;
  /** Command line run when the key is pressed */
  action: string;
  /** Context the binding is active in */
  context: string;
  description?: string;
}

export interface KeymapProvider {
  /** Context name that bindings without an explicit context belong to */
  readonly defaultContext: string;
  contexts(): string[];
  bindings(context: string): KeyBinding[];
  /** Whether a binding is part of the built-in keymap */
  isDefault(binding: KeyBinding): boolean;
}
