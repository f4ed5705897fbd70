#!/usr/bin/env tsx
/**
 * ico2png CLI - extract Windows icon images as PNG files
 */

import { run } from './cli'

process.exitCode = run(process.argv.slice(2))
