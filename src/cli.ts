#!/usr/bin/env node
import { Command } from 'commander';
import { startServer } from './commands/start.js';
import { lookupCommand } from './commands/lookup.js';
import { statusCommand } from './commands/status.js';

const program = new Command();

program
  .name('fleetboot')
  .description('dhcp boot responder for cluster nodes, backed by the inventory service')
  .version('0.1.0');

program
  .command('start')
  .description('start answering dhcp boot requests')
  .option('-c, --config <path>', 'config file path')
  .option('--inventory-url <url>', 'inventory (smd) base url')
  .option('--boot-script-url <url>', 'boot script base url handed to ipxe')
  .option('--ca-cert <path>', 'CA certificate for the inventory service')
  .option('--refresh-interval <duration>', 'cache refresh interval, e.g. 30s')
  .option('--listen <address>', 'dhcp listen address')
  .option('-p, --port <number>', 'dhcp port')
  .option('--api-port <number>', 'status api port')
  .option('-v, --verbose', 'show me everything')
  .action(startServer);

program
  .command('lookup <mac>')
  .description('show what a hardware address would be assigned')
  .option('-c, --config <path>', 'config file path')
  .option('--inventory-url <url>', 'inventory (smd) base url')
  .option('--ca-cert <path>', 'CA certificate for the inventory service')
  .action(lookupCommand);

program
  .command('status')
  .description('check a running server')
  .option('-c, --config <path>', 'config file path')
  .action(statusCommand);

await program.parseAsync(process.argv);
