#!/usr/bin/env -S node --import tsx
// cli/mod.ts

import { main } from "../lib/cli.ts";

await main();
