export interface ContextWindow {
  readonly model: string;
  readonly tokens: number;
}

export interface ContextWindowUsage {
  readonly model: string;
  readonly window: number;
  /** Share of the window the total would take, in percent. */
  readonly percentage: number;
  readonly fits: boolean;
}
