/**
 * Full-screen editor detection for interactive sessions.
 *
 * Editors never exit on their own, so an automated PTY run injects the
 * editor's quit-without-saving keys after a warm-up delay.
 */

import { posix } from 'node:path';

const ESC = '\x1b';
const CTRL_X = '\x18';
const CTRL_C = '\x03';

export interface EditorQuit {
  family: 'vi' | 'nano' | 'emacs';
  keys: string;
}

const VI: EditorQuit = { family: 'vi', keys: `${ESC}:qa!\r` };
// The trailing "n" answers "save modified buffer?"; unmodified buffers exit on the first keys.
const NANO: EditorQuit = { family: 'nano', keys: `${CTRL_X}n` };
const EMACS: EditorQuit = { family: 'emacs', keys: `${CTRL_X}${CTRL_C}n` };

const EDITORS: Record<string, EditorQuit> = {
  vi: VI,
  vim: VI,
  nvim: VI,
  view: VI,
  vimdiff: VI,
  rvim: VI,
  nano: NANO,
  pico: NANO,
  rnano: NANO,
  emacs: EMACS,
};

/** Wrappers that run the next word as the actual program */
const WRAPPERS = new Set(['sudo', 'env', 'command', 'exec', 'nohup', 'time']);

/**
 * Find the program a shell command line runs, skipping environment
 * assignments, wrapper commands and their flags.
 *
 * `sudo -u root EDITOR=x /usr/bin/vim file` → `vim`
 */
export function programOf(command: string): string | null {
  const tokens = command.trim().split(/\s+/).filter((token) => token.length > 0);
  let wrapped = false;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i] ?? '';
    if (/^[A-Za-z_][A-Za-z0-9_]*=/.test(token)) {
      continue;
    }
    if (wrapped && token.startsWith('-')) {
      // sudo -u <user>: the flag's argument is not the program either
      if (token === '-u' || token === '-g') {
        i++;
      }
      continue;
    }
    const name = posix.basename(token);
    if (WRAPPERS.has(name)) {
      wrapped = true;
      continue;
    }
    return name;
  }

  return null;
}

/**
 * Quit sequence for the editor a command launches, or null when the
 * command is not a known full-screen editor.
 */
export function editorQuitFor(command: string): EditorQuit | null {
  const program = programOf(command);
  if (program === null) {
    return null;
  }
  return EDITORS[program] ?? null;
}
