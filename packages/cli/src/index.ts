#!/usr/bin/env node
/**
 * itemfix CLI
 *
 * The CLI owns all I/O: workspace files, the scripting bridge, reports and
 * notifications. The core receives a session and buffers and returns
 * outcomes and warnings as data.
 */

import { Command } from 'commander';
import { modifyCommand } from './commands/modify.js';
import { checkCommand } from './commands/check.js';
import { exportCommand } from './commands/export.js';
import { error } from './utils/console.js';
import { errorMessage } from './utils/buffer.js';
import type { ExportOptions, ModifyOptions } from './types.js';

const program = new Command();

program
    .name('itemfix')
    .description('Bulk correction of line item texts and assignments')
    .version('1.0.0');

program
    .command('modify')
    .description('Apply the changes of a request workbook and notify the requester')
    .argument('<workbook>', 'request workbook (.xlsx)')
    .requiredOption('--sender <address>', 'address of the requester')
    .option('--company-code <code>', 'company code of the accounts')
    .option('--body <file>', 'request message body to read the company code from')
    .option('--status <status>', 'item status: open, cleared or all', 'open')
    .option('--workspace <dir>', 'workspace root')
    .action(async (workbook: string, options: ModifyOptions) => {
        process.exitCode = await modifyCommand(workbook, options);
    });

program
    .command('check')
    .description('Validate a request workbook and list the planned changes')
    .argument('<workbook>', 'request workbook (.xlsx)')
    .action(async (workbook: string) => {
        process.exitCode = await checkCommand(workbook);
    });

program
    .command('export')
    .description('Export the line items of accounts or a worklist to a text file')
    .requiredOption('--company-code <code>', 'company code of the accounts')
    .requiredOption('--out <file>', 'output file')
    .option('--accounts <ids>', 'comma-separated account ids')
    .option('--worklist <name>', 'worklist name')
    .option('--ledger <ledger>', 'ledger of the worklist: general-ledger or subledger', 'general-ledger')
    .option('--status <status>', 'item status: open, cleared or all', 'open')
    .option('--from <date>', 'lower posting date (YYYY-MM-DD)')
    .option('--to <date>', 'upper posting date (YYYY-MM-DD)')
    .option('--layout <name>', 'result grid layout')
    .option('--workspace <dir>', 'workspace root')
    .action(async (options: ExportOptions) => {
        process.exitCode = await exportCommand(options);
    });

program.parseAsync(process.argv).catch((err: unknown) => {
    error(`Unexpected error: ${errorMessage(err)}`);
    process.exitCode = 1;
});
