#!/usr/bin/env tsx
/**
 * Command line entry point.
 *
 * Usage:
 *   notekeeper --dir ~/notes find neovim
 *   notekeeper new "Configuring Neovim, editor, tools"
 *   notekeeper toggle-tag 20230504T162825--configuring-neovim__editor_tools.md unix
 */

import { runNotesCli } from '../src/cli';

process.exitCode = await runNotesCli();
