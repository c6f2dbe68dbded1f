export interface RenderCommandOptions {
  agent?: string;
  text?: boolean;
  progress?: boolean;
  color?: boolean;
  emoji?: boolean;
  verbose?: boolean;
  timestamps?: boolean;
  maxLines?: number | string;
  maxChars?: number | string;
  /** `true` when the flag is given without a path. */
  rawLog?: string | boolean;
  debug?: boolean;
}
