#!/usr/bin/env -S node --import tsx
// src/cli/bin/player-addon.ts
// CLI bootstrap (executes the parser). Kept separate from src/cli/index.ts so
// importing the factory never parses process.argv.
import { makeCli } from '..';

await makeCli().run();
