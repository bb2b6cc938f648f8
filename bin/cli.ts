#!/usr/bin/env tsx

import process from 'node:process'
import { runFromProcess } from '../src/cli/commands'

process.exitCode = await runFromProcess()
