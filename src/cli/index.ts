#!/usr/bin/env node
/**
 * skills — command-line front end for the skill engine.
 */

import { createProgram } from "./program.js";

await createProgram().parseAsync(process.argv);
