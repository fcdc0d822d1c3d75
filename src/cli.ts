#!/usr/bin/env node

import { createProgram, normalizeFlagStyle } from './program';

createProgram().parse(normalizeFlagStyle(process.argv));
