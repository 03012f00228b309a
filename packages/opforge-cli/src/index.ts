#!/usr/bin/env node
import { runInterface } from './program';

void runInterface(process.argv).then((code) => {
  process.exitCode = code;
});
