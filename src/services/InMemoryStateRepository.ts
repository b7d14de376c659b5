import type { IEngineState, IStateRepository } from "../types/engine.types";
import type { ITradeOutcome } from "../types/outcome.types";
import { StaleStateError } from "../utils/errors";

/**
 * Process-local repository with the same version check as the Mongo one.
 * Used by tests and by dry runs without a database.
 */
export class InMemoryStateRepository implements IStateRepository {
  private state: IEngineState | null;
  private commits = 0;

  constructor(initial: IEngineState | null = null) {
    this.state = initial ? structuredClone(initial) : null;
  }

  async load(): Promise<IEngineState | null> {
    return this.state ? structuredClone(this.state) : null;
  }

  async commit(next: IEngineState, expectedVersion: number, appendedOutcomes: ITradeOutcome[]): Promise<void> {
    const actual = this.state ? this.state.version : 0;
    if (actual !== expectedVersion) {
      throw new StaleStateError(expectedVersion, this.state ? actual : null);
    }
    const known = new Set(this.state ? this.state.outcomes.map((o) => o.id) : []);
    const outcomes = [...(this.state ? this.state.outcomes : []), ...appendedOutcomes.filter((o) => !known.has(o.id))];
    this.state = structuredClone({ ...next, outcomes });
    this.commits++;
  }

  getCommitCount(): number {
    return this.commits;
  }
}
