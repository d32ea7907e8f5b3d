import { runCli } from './cli'

await runCli()
