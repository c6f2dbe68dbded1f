export interface FlagsCommandOptions {
  text?: boolean;
}
