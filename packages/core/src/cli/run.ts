import { parseArgs } from 'util';
import {
    logError,
    toApplicationError,
    type Environment
} from '@persona-forge/shared';
import { createProfileService } from '../services/profile.service.js';
import { createFileProfileWriter, type ProfileWriter } from '../storage/profile-writer.js';
import { GenerateRequestSchema } from './generate-request.schema.js';

export const COUNT_PROMPT = 'Enter number of profiles to generate: ';

export const USAGE = `Usage: persona-forge [options]

Generates fake identity + browser fingerprint profiles, one JSON file each.

Options:
  --count <n>         Number of profiles (prompted for when omitted)
  --seed <n>          Seed for reproducible output
  --device <class>    Pin the device class (Desktop, Laptop, Mobile, Tablet)
  --browser <key>     Pin the browser (chrome, firefox, safari, edge)
  --os <key>          Pin the operating system (windows, macos, linux, android, ios)
  --locale <locale>   Identity locale, e.g. en_US or fr_FR
  --out <dir>         Output directory
  --no-financial      Leave card and bank fields empty
  --no-professional   Leave company, job title and website empty
  --help              Show this message`;

export interface CliIO {
    print(line: string): void;
    error(line: string): void;
    prompt(question: string): Promise<string>;
}

export interface RunCliOptions {
    env: Environment;
    io: CliIO;
    /** Replaces the file writer built from --out */
    writer?: ProfileWriter;
    referenceDate?: Date;
}

function parseCliArgs(argv: string[]) {
    return parseArgs({
        args: argv,
        strict: true,
        allowPositionals: false,
        options: {
            count: { type: 'string', short: 'n' },
            seed: { type: 'string' },
            device: { type: 'string' },
            browser: { type: 'string' },
            os: { type: 'string' },
            locale: { type: 'string' },
            out: { type: 'string', short: 'o' },
            'no-financial': { type: 'boolean' },
            'no-professional': { type: 'boolean' },
            help: { type: 'boolean', short: 'h' }
        }
    }).values;
}

/**
 * Runs one generate command and resolves to the process exit code.
 */
export async function runCli(argv: string[], options: RunCliOptions): Promise<number> {
    const { env, io } = options;

    let flags: ReturnType<typeof parseCliArgs>;
    try {
        flags = parseCliArgs(argv);
    } catch (error) {
        io.error(toApplicationError(error).message);
        io.error(USAGE);
        return 1;
    }

    if (flags.help) {
        io.print(USAGE);
        return 0;
    }

    const count = flags.count ?? await io.prompt(COUNT_PROMPT);

    const parsed = GenerateRequestSchema.safeParse({
        count,
        seed: flags.seed ?? env.PROFILE_SEED,
        device: flags.device,
        browser: flags.browser,
        os: flags.os,
        locale: flags.locale ?? env.PROFILE_LOCALE,
        out: flags.out ?? env.PROFILE_OUTPUT_DIR,
        financial: env.PROFILE_INCLUDE_FINANCIAL && !flags['no-financial'],
        professional: env.PROFILE_INCLUDE_PROFESSIONAL && !flags['no-professional']
    });

    if (!parsed.success) {
        io.error('Invalid arguments:');
        for (const issue of parsed.error.issues) {
            io.error(`  --${issue.path.join('.')}: ${issue.message}`);
        }
        return 1;
    }

    const request = parsed.data;
    const service = createProfileService({
        seed: request.seed,
        locale: request.locale,
        maxBatch: env.PROFILE_MAX_BATCH,
        referenceDate: options.referenceDate,
        writer: options.writer ?? createFileProfileWriter({
            directory: request.out,
            filePrefix: env.PROFILE_FILE_PREFIX
        })
    });

    try {
        await service.generateProfiles(request.count, {
            constraints: { deviceType: request.device, browser: request.browser, os: request.os },
            identity: { includeFinancial: request.financial, includeProfessional: request.professional },
            onWritten: location => io.print(`[✔] File saved: ${location}`)
        });
        return 0;
    } catch (error) {
        logError(error, { count: request.count });
        io.error(`Error: ${toApplicationError(error).message}`);
        return 1;
    }
}
