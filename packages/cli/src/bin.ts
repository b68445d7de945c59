#!/usr/bin/env node
/**
 * tracegrade executable entry point
 */
import { run } from "./cli.js";

void run();
