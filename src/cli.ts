#!/usr/bin/env node
import { createProgram } from './command';

createProgram().parse(process.argv);
