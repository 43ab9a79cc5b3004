import { program } from 'commander'
import { fileURLToPath } from 'url'
import { realpathSync } from 'fs'
import { logger } from './utils/logger.js'
import { getLogger } from './utils/logger-context.js'
import { getPackageInfo } from './utils/package-info.js'
import { parseConvertOptions } from './lib/ConvertOptions.js'
import { ConvertCommand } from './commands/convert.js'
import { ConversionError } from './types/index.js'

// Get package.json for version
const __filename = fileURLToPath(import.meta.url)
const packageJson = getPackageInfo(__filename)

const EXAMPLES = `
Examples:
  $ jira2md PROJ-42.xml
  $ jira2md --output output.md PROJ-42.xml
  $ jira2md --details off PROJ-42.xml
  $ jira2md *.xml`

/**
 * Convert the given files with raw commander options
 * Exported for testing
 * @returns Process exit code
 */
export async function runConvert(files: string[], rawOptions: unknown): Promise<number> {
  const log = getLogger()

  if (files.length === 0) {
    log.error('Error: no input files specified')
    program.outputHelp({ error: true })
    return 1
  }

  try {
    const options = parseConvertOptions(files, rawOptions)
    const command = new ConvertCommand()
    await command.execute({ options })
    return 0
  } catch (error) {
    if (error instanceof ConversionError && error.inputFile) {
      log.error(`Error processing ${error.inputFile}: ${error.message}`)
    } else {
      log.error(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`)
    }
    if (error instanceof Error && error.stack) {
      log.debug(error.stack)
    }
    return 1
  }
}

program
  .name('jira2md')
  .description(packageJson.description)
  .version(packageJson.version, '--version', 'Show version')
  .usage('[options] FILE [FILE...]')
  .argument('[files...]', 'JIRA XML export files to convert')
  .option('-o, --output <path>', 'Output file path (defaults to *.details.md or *.md)')
  .option('-d, --details <mode>', 'Include custom fields details (on|off|enabled|disabled|1|0)', 'enabled')
  .option('-v, --verbose', 'Verbose output')
  .option('-f, --force', 'Force overwrite existing files')
  .option('--debug', 'Enable debug output (default: based on JIRA2MD_DEBUG env var)')
  .addHelpText('after', EXAMPLES)
  .hook('preAction', (thisCommand) => {
    // Flag wins over the environment variable
    const debugFlag: unknown = thisCommand.opts().debug
    const envDebug = process.env.JIRA2MD_DEBUG === 'true'
    logger.setDebug(typeof debugFlag === 'boolean' ? debugFlag : envDebug)
  })
  .action(async (files: string[], options: unknown) => {
    process.exitCode = await runConvert(files, options)
  })

export { program }

// Parse CLI arguments (only when run directly, not when imported for testing)
// Resolve symlinks to handle npm link and global installs
const isRunDirectly = process.argv[1] && ((): boolean => {
  try {
    const scriptPath = realpathSync(process.argv[1])
    return scriptPath === __filename
  } catch {
    // If we can't resolve the path, assume we should run
    return true
  }
})()

if (isRunDirectly) {
  try {
    await program.parseAsync()
  } catch (error) {
    logger.error(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`)
    process.exit(1)
  }
}
