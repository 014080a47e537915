import type { StageRegistry } from '../../../registry.js'
import { numbersRegistry, numbersSeed } from '../../../__tests__/helpers.js'

export default function setup(registry: StageRegistry): void {
  registry.register(numbersRegistry().resolve('num')).registerSeed('seed', numbersSeed)
}
