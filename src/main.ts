#!/usr/bin/env node

import * as fs from "fs/promises";
import * as path from "path";
import _ from "lodash";
import {DecodeOptions, Logger} from "./context";
import {ProfileError} from "./errors";
import {open, save, summary, verify} from "./profile";
import {fromText, toText} from "./text";
import {clearCollection, getPropertyAt} from "./tree";

/**
 * Options
 */

export interface CliOptions {
    inputs: string[];
    output?: string;
    path?: string;
    indent: number;
    verbose: boolean;
    backup: boolean;
}

const DEFAULTS = {
    indent: 2,
    verbose: false,
    backup: true,
};

export const COMMANDS = ["extract", "build", "verify", "clear", "help"];

export function parseArgs(args: string[]): { command: string, options: CliOptions } {
    const [command = "help", ...rest] = args;
    const parsed: Partial<CliOptions> & { inputs: string[] } = {inputs: []};

    for (let i = 0; i < rest.length; i++) {
        const arg = rest[i];
        switch (arg) {
            case "-i":
            case "--input":
                parsed.inputs.push(value(rest, ++i, arg));
                break;
            case "-o":
            case "--output":
                parsed.output = value(rest, ++i, arg);
                break;
            case "-p":
            case "--path":
                parsed.path = value(rest, ++i, arg);
                break;
            case "--indent": {
                const indent = Number(value(rest, ++i, arg));
                if (!Number.isInteger(indent) || indent < 0) {
                    throw new Error(`--indent takes a non-negative integer, got '${rest[i]}'`);
                }
                parsed.indent = indent;
                break;
            }
            case "--no-backup":
                parsed.backup = false;
                break;
            case "--verbose":
                parsed.verbose = true;
                break;
            default:
                throw new Error(`Unknown option: ${arg}`);
        }
    }
    return {command, options: _.defaults(parsed, DEFAULTS)};
}

function value(args: string[], i: number, option: string) {
    const found = args[i];
    if (found === undefined || found.startsWith("-")) {
        throw new Error(`${option} needs a value`);
    }
    return found;
}

/** `x.arkprofile.json` becomes `x.arkprofile`; any other name gets its extension replaced. */
export function buildOutputPath(input: string) {
    if (input.endsWith(".arkprofile.json")) {
        return input.slice(0, -".json".length);
    }
    const {dir, name} = path.parse(input);
    return path.join(dir, `${name}.arkprofile`);
}

/**
 * Commands
 */

export class ProfileCli {

    constructor(private readonly options: CliOptions, private readonly logger: Logger = console) {
        //
    }

    private input() {
        const [input] = this.options.inputs;
        if (input === undefined) {
            throw new Error("an input file is required (-i <file>)");
        }
        return input;
    }

    /**
     * With --verbose every property read is listed with its declared size and
     * decoder warnings are shown. Otherwise only the commands report findings.
     */
    private get decodeOptions(): DecodeOptions {
        if (this.options.verbose) {
            return {trace: true, logger: this.logger};
        }
        return {logger: {...this.logger, debug: _.noop, warn: _.noop}};
    }

    async extract() {
        const input = this.input();
        const profile = await open(input, this.decodeOptions);
        const output = this.options.output ?? `${input}.json`;
        await fs.writeFile(output, toText(profile, this.options.indent), "utf8");
        this.logger.info(`Extracted ${path.basename(input)} -> ${output} (${summary(profile)})`);
        return 0;
    }

    async build() {
        const input = this.input();
        const profile = fromText(await fs.readFile(input, "utf8"));
        const output = this.options.output ?? buildOutputPath(input);
        await save(profile, output);
        this.logger.info(`Built ${output} from ${path.basename(input)}`);
        return 0;
    }

    async verify() {
        if (this.options.inputs.length === 0) {
            throw new Error("an input file is required (-i <file>)");
        }
        let failed = 0;
        for (const input of this.options.inputs) {
            const findings = await verify(input, this.decodeOptions);
            this.logger.info(`File: ${input}`);
            for (const finding of findings) {
                const at = finding.offset === null ? "" : ` at offset ${finding.offset}`;
                this.logger.error(`  ${finding.code} '${finding.name}'${at}: ${finding.message}`);
            }
            if (findings.length === 0) {
                this.logger.info("  All sizes OK");
            } else {
                this.logger.info(`  ERRORS: ${findings.length}`);
                failed++;
            }
        }
        return failed === 0 ? 0 : 1;
    }

    async clear() {
        const input = this.input();
        const target = this.options.path;
        if (target === undefined) {
            throw new Error("a property path is required (-p MyArkData.ArkItems)");
        }
        const profile = await open(input, this.decodeOptions);
        const node = getPropertyAt(profile.properties, target);
        if (!node) {
            throw new ProfileError(`no property at '${target}'`);
        }
        const removed = clearCollection(node);
        const output = this.options.output ?? input;
        if (this.options.backup && output === input) {
            await fs.copyFile(input, `${input}.bak`);
            this.logger.info(`Backup created: ${input}.bak`);
        }
        await save(profile, output);
        this.logger.info(`Cleared ${target} (${removed} elements) -> ${output}`);
        return 0;
    }

    run(command: string): Promise<number> {
        switch (command) {
            case "extract":
                return this.extract();
            case "build":
                return this.build();
            case "verify":
                return this.verify();
            case "clear":
                return this.clear();
            default:
                throw new Error(`Unknown command: ${command}`);
        }
    }
}

/**
 * Entry point
 */

function printHelp() {
    console.log(`
arkprofile - inspect, verify and repair PlayerLocalData.arkprofile files

USAGE:
  arkprofile <command> [options]

COMMANDS:
  extract            .arkprofile -> JSON
  build              JSON -> .arkprofile
  verify             Check every property size of one or more profiles
  clear              Empty an array, set or map, e.g. MyArkData.ArkItems
  help               Show this help

OPTIONS:
  -i, --input <file>       Input file (repeat for verify)
  -o, --output <file>      Output file
  -p, --path <path>        Property path (dot notation)
  --indent <n>             JSON indentation (default: 2)
  --no-backup              Don't back up the input before clearing in place
  --verbose                Trace every property read; show warnings and error stacks

EXAMPLES:
  arkprofile extract -i PlayerLocalData.arkprofile
  arkprofile build -i PlayerLocalData.arkprofile.json
  arkprofile verify -i PlayerLocalData.arkprofile
  arkprofile clear -i PlayerLocalData.arkprofile -p MyArkData.ArkTamedDinosData
`);
}

export async function main(args: string[]): Promise<number> {
    let verbose = args.includes("--verbose");
    try {
        const {command, options} = parseArgs(args);
        verbose = options.verbose;
        if (command === "help" || command === "--help" || command === "-h") {
            printHelp();
            return 0;
        }
        if (!COMMANDS.includes(command)) {
            console.error(`Unknown command: ${command}`);
            printHelp();
            return 1;
        }
        return await new ProfileCli(options).run(command);
    } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        console.error(`Error: ${error.message}`);
        if (verbose) {
            console.error(error.stack);
        }
        return 1;
    }
}

if (require.main === module) {
    main(process.argv.slice(2)).then(code => {
        process.exitCode = code;
    });
}
