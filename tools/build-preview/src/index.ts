#!/usr/bin/env node
import { Command, Option } from 'commander';
import * as dotenv from 'dotenv';
import {
    DEFAULT_CONFIG_PATH,
    DEFAULT_PACKAGES_PATH,
    runCheck,
    runPreview,
    type CommonOptions,
    type PreviewOptions
} from './commands.js';
import { PACKAGE_TAGS } from './modules/context.js';

// Lets `${NAME}` credentials come from a local .env file
dotenv.config();

const program = new Command();

program
    .name('imageforge')
    .description('Check build configuration and preview package build commands')
    .version('0.1.0');

program
    .command('check')
    .description('Load, validate and resolve the configuration, then print a summary')
    .option('-c, --config <file>', 'Configuration file', DEFAULT_CONFIG_PATH)
    .option('-e, --app-env <env>', 'Environment used to pick config.<env>.yaml')
    .option('-l, --log-level <level>', 'silent, error, warn, info, debug or trace')
    .action((options: CommonOptions) => {
        process.exitCode = runCheck(options);
    });

program
    .command('preview')
    .description('Print the build commands of one package variant')
    .requiredOption('-p, --package <name>', 'Package name, as listed in the package catalogue')
    .option('-v, --variant <name>', 'Variant to build', 'stable')
    .addOption(new Option('-t, --tag <tag>', 'Decides the install prefix').choices(PACKAGE_TAGS).makeOptionMandatory())
    .option('-c, --config <file>', 'Configuration file', DEFAULT_CONFIG_PATH)
    .option('--packages <file>', 'Package catalogue', DEFAULT_PACKAGES_PATH)
    .option('-e, --app-env <env>', 'Environment used to pick config.<env>.yaml')
    .option('-l, --log-level <level>', 'silent, error, warn, info, debug or trace')
    .action((options: PreviewOptions) => {
        process.exitCode = runPreview(options);
    });

program.parse();
