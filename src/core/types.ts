export type { FlagsCommandOptions } from "./types/flags.js";
export type { RenderCommandOptions } from "./types/render.js";
