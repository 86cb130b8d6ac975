import { runBasicExample } from './basic'
import { loadConfig } from './config'

const { capacityHint } = loadConfig()

try {
  const result = runBasicExample(capacityHint)
  console.log(`Extracted keys: ${result.extracted.join(', ')}`)
} catch (e) {
  console.error(e)
  process.exitCode = 1
}
