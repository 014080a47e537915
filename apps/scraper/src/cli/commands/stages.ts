import { classifyError } from '../../errors.js'
import { loadPipeline } from '../pipeline.js'

interface StagesCommandArgs {
  pipeline: string
}

export async function runStagesCommand(
  args: StagesCommandArgs,
  write: (line: string) => void = line => console.log(line)
): Promise<number> {
  if (!args.pipeline) {
    console.error('Missing --pipeline <module>')
    return 2
  }

  try {
    const registry = await loadPipeline(args.pipeline)
    for (const id of registry.listSeeds()) {
      write(`seed   ${id}`)
    }
    for (const id of registry.list()) {
      write(`stage  ${id}`)
    }
    return 0
  } catch (error) {
    console.error(`Failed to load pipeline: ${classifyError(error).message}`)
    return 2
  }
}
