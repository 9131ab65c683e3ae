import { Command, CommanderError } from 'commander'
import { bold, dim } from 'colorette'

import { RuleServerClient } from './api'
import { fail } from './cli-utils'
import { DEFAULT_SERVER, RC_FILE_NAME, loadClientConfig } from './config/config'
import { deployCLI } from './cmd/deploy'
import { getRulesCLI } from './cmd/get-rules'
import { listTechnologiesCLI } from './cmd/list-technologies'
import { ruleCLI } from './cmd/rule'
import { serveCLI, type ServeDeps } from './cmd/serve'

export const CLI_VERSION = '0.1.0'

export interface CliDeps {
  fetch?: typeof fetch
  cwd?: string
  env?: NodeJS.ProcessEnv
  serve?: ServeDeps
}

/**
 * Builds the `rulehub` program. Actions report their exit code through
 * `setExitCode` instead of exiting, so one process can run several.
 */
export function buildProgram(deps: CliDeps, setExitCode: (code: number) => void): Command {
  const cwd = deps.cwd ?? process.cwd()
  const env = deps.env ?? process.env

  const program = new Command()
    .name('rulehub')
    .description(`${bold('rulehub')}: fetch, serve and deploy per-technology lint rules`)
    .version(CLI_VERSION)
    .option('--server <url>', `rule server URL (default: ${DEFAULT_SERVER})`)

  // throw CommanderError instead of exiting; subcommands inherit this
  program.exitOverride()
  program.showHelpAfterError()
  program.showSuggestionAfterError()

  const client = () => {
    const { server } = loadClientConfig({ cwd, env, flags: { server: program.opts<{ server?: string }>().server } })
    return new RuleServerClient(server, deps.fetch)
  }

  program
    .command('serve')
    .description('Run the rule server')
    .option('--host <host>', 'interface to bind (default: API_HOST or 0.0.0.0)')
    .option('--port <port>', 'port to bind (default: API_PORT or 8000)')
    .option('--log-level <level>', 'DEBUG|INFO|WARNING|ERROR|CRITICAL')
    .option('--provider <name>', 'rule provider: github|mock')
    .action(async (opts: { host?: string; port?: string; logLevel?: string; provider?: string }) => {
      setExitCode(await serveCLI({ ...opts, cwd, env }, deps.serve))
    })

  program
    .command('deploy')
    .description('Deploy rules into a project (.cursor-rules/)')
    .option('--target <dir>', 'target project directory', '.')
    .option('--technology <name>', 'technology to deploy (auto-detected when omitted)')
    .action(async (opts: { target: string; technology?: string }) => {
      setExitCode(await deployCLI(client(), { ...opts, cwd }))
    })

  program
    .command('get-rules')
    .description('Show the rules that apply to a file')
    .requiredOption('--file <path>', 'path to the file')
    .option('--project-type <name>', 'project technology; wins over the file extension')
    .action(async (opts: { file: string; projectType?: string }) => {
      setExitCode(await getRulesCLI(client(), opts))
    })

  program
    .command('rule')
    .description('Print one rule as JSON')
    .argument('<technology>', 'technology name')
    .argument('<id>', 'rule id')
    .action(async (technology: string, id: string) => {
      setExitCode(await ruleCLI(client(), technology, id))
    })

  program
    .command('list-technologies')
    .description('List available technologies')
    .action(async () => {
      setExitCode(await listTechnologiesCLI(client()))
    })

  program.addHelpText(
    'afterAll',
    `
${dim('Server URL sources (priority high→low):')} --server ${bold('>')} RULEHUB_SERVER ${bold('>')} ${RC_FILE_NAME} ${bold('>')} ${DEFAULT_SERVER}
`,
  )

  return program
}

/** Parse `argv` (node-style, with the two leading entries) and run; resolves to the exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  let exitCode = 0
  const program = buildProgram(deps, (code) => {
    exitCode = code
  })

  if (argv.length <= 2) {
    program.outputHelp()
    return 1
  }

  try {
    await program.parseAsync(argv)
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode
    fail(e instanceof Error && e.stack ? e.stack : String(e))
    return 1
  }
  return exitCode
}
