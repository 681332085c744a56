#!/usr/bin/env node
// Kite command-line entry point.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import {main} from './cli.js'

process.exitCode = main(process.argv.slice(2))
