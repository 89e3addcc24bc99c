#!/usr/bin/env node

import { buildCli } from './cli.js';

buildCli({ exitProcess: true }).parse();
