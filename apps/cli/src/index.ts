#!/usr/bin/env tsx
import { main } from "./main.js";
import { bootstrapEnv, readEnv } from "./lib/env.js";

bootstrapEnv();

process.exitCode = main(process.argv.slice(2), readEnv());
