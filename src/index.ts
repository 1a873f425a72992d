#!/usr/bin/env node
import { run } from "./cli";

process.exit(run(process.argv));
