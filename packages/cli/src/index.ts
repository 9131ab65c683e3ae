import 'dotenv/config'

import { runCli } from './program'

runCli(process.argv).then(
  (code) => {
    process.exitCode = code
  },
  (e: unknown) => {
    console.error(e)
    process.exitCode = 1
  },
)
