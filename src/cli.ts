#!/usr/bin/env node
/**
 * appliance-config CLI - composition root.
 * Command logic lives in src/cli/commands.
 */

import { createProgram } from "./cli/program";

createProgram().parse();
