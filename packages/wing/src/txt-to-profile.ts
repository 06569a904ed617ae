#!/usr/bin/env node
/**
 * txt-to-profile — turn an airfoil coordinate listing into a profile source file.
 *
 *   txt-to-profile naca2412.txt naca2412 naca2412.json
 */

import { convertProfileFile } from './profile-source.js';

const args = process.argv.slice(2);
if (args.length !== 3) {
  console.error('Usage: txt-to-profile <input.txt> <name> <output.json>');
  process.exit(1);
}

const [input, name, output] = args;
const points = convertProfileFile(input, name, output);
console.error(`${output}: ${points.length} points from ${input}`);
