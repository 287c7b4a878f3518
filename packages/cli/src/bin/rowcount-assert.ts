#!/usr/bin/env node
import { createCLI } from '../cli.js'

await createCLI().parseAsync(process.argv)
