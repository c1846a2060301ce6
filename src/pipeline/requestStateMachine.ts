import { PIPELINE_STATES, type PipelineState } from './types.js'

/**
 * Per-request state: strictly forward, one step at a time.
 * CLASSIFYING → PARALLEL_ANALYSIS → SYNTHESIZING → RESPONDED → BACKGROUND_PROCESSING → DONE
 */
export class RequestStateMachine {
  private current: PipelineState = PIPELINE_STATES[0]
  private readonly visited: PipelineState[] = [PIPELINE_STATES[0]]

  constructor(
    readonly requestId: string,
    private readonly onTransition?: (state: PipelineState) => void
  ) {
    onTransition?.(this.current)
  }

  get state(): PipelineState {
    return this.current
  }

  transition(next: PipelineState): void {
    const from = PIPELINE_STATES.indexOf(this.current)
    if (PIPELINE_STATES.indexOf(next) !== from + 1) {
      throw new Error(`Illegal pipeline transition ${this.current} → ${next} (${this.requestId})`)
    }
    this.current = next
    this.visited.push(next)
    this.onTransition?.(next)
  }

  history(): PipelineState[] {
    return [...this.visited]
  }
}
