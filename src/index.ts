#!/usr/bin/env node
/**
 * linkspace CLI entrypoint
 */

// The CLI module parses process.argv and runs the command
import './cli.js';
