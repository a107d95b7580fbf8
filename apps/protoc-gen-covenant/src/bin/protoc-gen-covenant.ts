#!/usr/bin/env -S node --import tsx
import { main } from "../index.js";

process.exitCode = await main();
