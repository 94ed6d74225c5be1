/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command, CommanderError } from 'commander'
import { DEFAULT_DEGREES_PATH, YEARS_PER_DEGREE } from '../degrees'
import { VERSION } from '../index'
import { isSiteFormat, SITE_FORMATS, type SiteFormat } from '../site'

export type CommandName = 'scrape' | 'build-site' | 'run' | 'help'

export interface CLIArgs {
  command: CommandName
  quiet: boolean
  verbose: boolean
  noCache: boolean
  cacheDir: string | undefined
  /** Degree list JSON file */
  degreesPath: string
  /** Where scraped .adoc files are written */
  outputDir: string
  /** Number of enrollment years scraped per degree */
  years: number
  concurrency: number
  timeout: number
  docsUrl: string | undefined
  title: string | undefined
  /** Where build-site reads .adoc files */
  inputDir: string
  siteDir: string
  formats: SiteFormat[]
}

const DEFAULT_OUTPUT_DIR = 'output'
const DEFAULT_SITE_DIR = 'site'
const DEFAULT_CONCURRENCY = 4
const DEFAULT_TIMEOUT_MS = 10_000

/** Commander error codes thrown after printing help or the version */
const HELP_CODES = new Set(['commander.help', 'commander.helpDisplayed', 'commander.version'])

const DESCRIPTION = `Build unified course descriptions for university degrees.

Scrapes the study plan of each configured degree into AsciiDoc documents,
then converts them into a static site (HTML and PDF).

Examples:
  $ course-descriptions scrape
  $ course-descriptions scrape --degrees config/degrees.json --years 2
  $ course-descriptions build-site -f html,pdf
  $ course-descriptions run`

function addScrapeOptions(command: Command): Command {
  return command
    .option('--degrees <path>', 'Degree list (JSON)', DEFAULT_DEGREES_PATH)
    .option('-o, --output-dir <dir>', 'Output directory for .adoc files', DEFAULT_OUTPUT_DIR)
    .option('--years <num>', 'Enrollment years per degree', String(YEARS_PER_DEGREE))
    .option('--concurrency <num>', 'Max concurrent course scrapes', String(DEFAULT_CONCURRENCY))
    .option('--timeout <ms>', 'Timeout per page in ms', String(DEFAULT_TIMEOUT_MS))
    .option('--docs-url <url>', 'Documentation link shown on the index page')
    .option('--title <title>', 'Index page title')
}

function addSiteOptions(command: Command, withInput: boolean): Command {
  const withDirs = withInput
    ? command.option('-i, --input-dir <dir>', 'Directory of .adoc files', DEFAULT_OUTPUT_DIR)
    : command
  return withDirs
    .option('-s, --site-dir <dir>', 'Site output directory', DEFAULT_SITE_DIR)
    .option('-f, --format <formats>', 'Site formats: adoc,html,pdf', SITE_FORMATS.join(','))
}

function createProgram(): Command {
  const program = new Command()
    .name('course-descriptions')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--no-cache', 'Fetch every page again')
    .option(
      '--cache-dir <dir>',
      'Custom cache directory (or set COURSE_DESCRIPTIONS_CACHE_DIR)'
    )

  // ============ SCRAPE ============
  addScrapeOptions(
    program.command('scrape').description('Scrape course descriptions into AsciiDoc files')
  )

  // ============ BUILD-SITE ============
  addSiteOptions(
    program.command('build-site').description('Convert AsciiDoc files into HTML and PDF'),
    true
  )

  // ============ RUN (scrape + build-site) ============
  addSiteOptions(
    addScrapeOptions(program.command('run').description('Scrape, then build the site')),
    false
  )

  return program
}

function parseCommandName(name: string): CommandName {
  if (name === 'scrape' || name === 'build-site' || name === 'run') {
    return name
  }
  return 'help'
}

function parseInteger(value: unknown, option: string, fallback: number): number {
  if (value === undefined) return fallback
  const parsed = Number.parseInt(String(value), 10)
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`Invalid value for ${option}: ${String(value)}`)
  }
  return parsed
}

function parseFormats(value: unknown): SiteFormat[] {
  if (typeof value !== 'string') return [...SITE_FORMATS]
  const formats: SiteFormat[] = []
  for (const raw of value.split(',')) {
    const format = raw.trim()
    if (!format) continue
    if (!isSiteFormat(format)) {
      throw new Error(`Unknown format: ${format} (expected ${SITE_FORMATS.join(', ')})`)
    }
    if (!formats.includes(format)) formats.push(format)
  }
  return formats
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function buildCLIArgs(commandName: string, opts: Record<string, unknown>): CLIArgs {
  const outputDir = optionalString(opts.outputDir) ?? DEFAULT_OUTPUT_DIR

  return {
    command: parseCommandName(commandName),
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    noCache: opts.cache === false,
    cacheDir: optionalString(opts.cacheDir),
    degreesPath: optionalString(opts.degrees) ?? DEFAULT_DEGREES_PATH,
    outputDir,
    years: parseInteger(opts.years, '--years', YEARS_PER_DEGREE),
    concurrency: Math.max(1, parseInteger(opts.concurrency, '--concurrency', DEFAULT_CONCURRENCY)),
    timeout: parseInteger(opts.timeout, '--timeout', DEFAULT_TIMEOUT_MS),
    docsUrl: optionalString(opts.docsUrl),
    title: optionalString(opts.title),
    // run builds the site from what it just scraped
    inputDir: optionalString(opts.inputDir) ?? outputDir,
    siteDir: optionalString(opts.siteDir) ?? DEFAULT_SITE_DIR,
    formats: parseFormats(opts.format)
  }
}

function attachActions(program: Command, onParsed: (args: CLIArgs) => void): void {
  // optsWithGlobals() includes global options from the parent program
  for (const cmd of program.commands) {
    cmd.action(() => {
      onParsed(buildCLIArgs(cmd.name(), cmd.optsWithGlobals()))
    })
  }
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program = createProgram()

  let result: CLIArgs | null = null
  attachActions(program, (args) => {
    result = args
  })

  program.parse()

  if (!result) {
    program.help()
  }

  return result ?? buildCLIArgs('help', {})
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()

  if (!exitOnHelp) {
    program.exitOverride()
    program.configureOutput({ writeOut: () => {}, writeErr: () => {} })
  }

  let result: CLIArgs | null = null
  attachActions(program, (args) => {
    result = args
  })

  try {
    program.parse(argv, { from: 'user' })
  } catch (error) {
    // exitOverride throws on help/version; anything else is a real error
    if (!(error instanceof CommanderError && HELP_CODES.has(error.code))) {
      throw error
    }
  }

  return result ?? buildCLIArgs('help', {})
}
