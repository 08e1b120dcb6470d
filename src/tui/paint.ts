import terminalKit from 'terminal-kit';
import type { FrameRow, FrameStyle } from './render.js';

export type Term = typeof terminalKit.terminal;

function writeStyled(term: Term, text: string, style: FrameStyle, colorsDisabled: boolean): void {
  if (colorsDisabled) {
    if (style === 'selected' || style === 'activeTab') term.inverse(text);
    else term(text);
    return;
  }

  switch (style) {
    case 'header':
      term.bold.bgBlue.white(text);
      return;
    case 'tab':
      term.yellow(text);
      return;
    case 'activeTab':
      term.bold.bgBlue.yellow(text);
      return;
    case 'dim':
      term.dim(text);
      return;
    case 'done':
      term.brightBlack(text);
      return;
    case 'selected':
      term.bgWhite.black(text);
      return;
    case 'footer':
      term.bgRed.white(text);
      return;
    case 'dialogTitle':
      term.bold.bgBlue.white(text);
      return;
    case 'field':
      term.inverse(text);
      return;
    case 'focusedField':
      term.bgCyan.black(text);
      return;
    case 'helpKey':
      term.green(text);
      return;
    case 'plain':
    case 'todo':
    case 'dialog':
      term(text);
      return;
  }
}

export function paintFrame(term: Term, rows: readonly FrameRow[], colorsDisabled: boolean): void {
  term.hideCursor();
  rows.forEach((row, idx) => {
    term.moveTo(1, idx + 1);
    for (const segment of row) {
      writeStyled(term, segment.text, segment.style, colorsDisabled);
    }
    term.styleReset();
  });
}
