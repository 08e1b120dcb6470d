export interface ParsedTodo {
  text: string;
  done: boolean;
  category: string;
  /** True when the category came from an inline `#tag` rather than the fallback. */
  tagged: boolean;
  lineNumber: number;
}
