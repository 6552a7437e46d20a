#!/usr/bin/env node
/**
 * addon-sync CLI entrypoint
 *
 * Imports the CLI module, which parses arguments and runs the command.
 */

import './cli.js';
