import { Inject, Injectable, Optional } from "@nestjs/common";
import { BehaviorSubject, Observable, distinctUntilChanged, map } from "rxjs";
import { isDeepStrictEqual } from "util";
import { DEFAULT_CONFIG } from "./defaults";
import { INITIAL_CONFIG_TOKEN } from "./config.const";
import type { AgentmdConfig } from "./types";

export type ConfigSection = keyof AgentmdConfig;

/**
 * Holds the active configuration. Readers always receive copies, so a
 * snapshot taken at the start of an execution cannot be changed under it.
 */
@Injectable()
export class ConfigStore {
  private readonly subject: BehaviorSubject<AgentmdConfig>;

  /** Emits the current configuration, then every snapshot that differs. */
  readonly changes$: Observable<AgentmdConfig>;

  constructor(
    @Optional()
    @Inject(INITIAL_CONFIG_TOKEN)
    initialConfig?: AgentmdConfig,
  ) {
    this.subject = new BehaviorSubject<AgentmdConfig>(
      structuredClone(initialConfig ?? DEFAULT_CONFIG),
    );
    this.changes$ = this.select((config) => config);
  }

  setSnapshot(snapshot: AgentmdConfig): void {
    this.subject.next(structuredClone(snapshot));
  }

  getSnapshot(): AgentmdConfig {
    return structuredClone(this.subject.getValue());
  }

  section<K extends ConfigSection>(key: K): AgentmdConfig[K] {
    return structuredClone(this.subject.getValue()[key]);
  }

  /** Observes one derived value; repeats of an equal value are suppressed. */
  select<T>(selector: (config: AgentmdConfig) => T): Observable<T> {
    return this.subject.pipe(
      map((config) => structuredClone(selector(config))),
      distinctUntilChanged<T>(isDeepStrictEqual),
    );
  }
}
