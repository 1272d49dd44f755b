export interface NormalizedDiff {
  diffText: string;
  /** True when the text handed to `git apply` differs from the input beyond outer blank lines */
  changed: boolean;
  repairs: string[];
}

export const HUNK_HEADER_RE = /^@@\s+-(\d+)(?:,(\d+))?\s+\+(\d+)(?:,(\d+))?\s+@@/;
const DIFF_GIT_RE = /^diff --git a\/(.+?) b\/(.+?)$/;
const FENCE_RE = /^\s*(```|~~~)/;

type Section = 'preamble' | 'header' | 'hunk' | 'discard';

interface FileBlock {
  /** Paths from a `diff --git` line, used to rebuild missing headers */
  gitPaths?: [string, string];
  oldHeader?: string;
  newHeader?: string;
  newFile: boolean;
  deletedFile: boolean;
}

/**
 * Cleans up diff text produced by a model before it is applied:
 * strips markdown fences and surrounding prose, drops hunk-looking lines that
 * have no valid `@@` header, adds missing `a/` and `b/` prefixes, and inserts
 * missing `---`/`+++` headers. Output ends with exactly one newline, or is empty.
 *
 * Carriage returns on hunk body lines belong to the patched file and are kept. Only when
 * every line ends in CRLF is the whole text treated as CRLF-converted and unwrapped.
 */
export function normalizeDiff(raw: string): NormalizedDiff {
  const repairs = new Set<string>();
  const out: string[] = [];
  const rawLines = raw.split('\n');
  const convertedText = rawLines.every((line) => line === '' || line.endsWith('\r'));
  const lines = rawLines
    .map((line) => (convertedText ? stripCr(line) : line))
    .filter((line) => {
      if (!FENCE_RE.test(line)) return true;
      repairs.add('stripped code fences');
      return false;
    });

  let section: Section = 'preamble';
  let block: FileBlock | undefined;

  for (let i = 0; i < lines.length; i++) {
    const body = lines[i];
    // Structural lines are matched and written without a trailing CR.
    const line = stripCr(body);
    const next = lines[i + 1] ?? '';

    if (line.startsWith('diff --git ')) {
      const repaired = repairDiffGitLine(line, repairs);
      const match = DIFF_GIT_RE.exec(repaired);
      out.push(repaired);
      block = {
        gitPaths: match ? [match[1], match[2]] : undefined,
        newFile: false,
        deletedFile: false,
      };
      section = 'header';
      continue;
    }

    // Inside a hunk "--- x" is a removed line unless a "+++" header follows it.
    const startsHeaderPair = line.startsWith('--- ') && next.startsWith('+++ ');
    if (startsHeaderPair || (line.startsWith('--- ') && section !== 'hunk')) {
      if (section === 'hunk' || section === 'discard' || section === 'preamble' || !block) {
        block = { newFile: false, deletedFile: false };
      }
      block.oldHeader = prefixHeader(line, '--- ', 'a/', repairs);
      out.push(block.oldHeader);
      section = 'header';
      continue;
    }

    if (line.startsWith('+++ ') && section !== 'hunk') {
      block ??= { newFile: false, deletedFile: false };
      block.newHeader = prefixHeader(line, '+++ ', 'b/', repairs);
      if (!block.oldHeader) {
        block.oldHeader = oldHeaderFor(block, block.newHeader);
        out.push(block.oldHeader);
        repairs.add('inserted missing file headers');
      }
      out.push(block.newHeader);
      section = 'header';
      continue;
    }

    if (line.startsWith('@@')) {
      if (block && HUNK_HEADER_RE.test(line) && completeHeaders(block, out, repairs)) {
        out.push(line);
        section = 'hunk';
      } else {
        repairs.add('dropped hunk fragment without a valid header');
        section = 'discard';
      }
      continue;
    }

    if (section === 'hunk') {
      if (isHunkBodyLine(line)) {
        // A bare CR is an empty context line of a CRLF file whose leading space was lost.
        out.push(body === '\r' ? ' \r' : body);
      } else {
        repairs.add('dropped text after hunk');
        section = 'discard';
      }
      continue;
    }

    if (section === 'header' && block && isHeaderMetadataLine(line)) {
      if (line.startsWith('new file mode ')) block.newFile = true;
      if (line.startsWith('deleted file mode ')) block.deletedFile = true;
      out.push(line);
      continue;
    }

    if (line.trim() !== '') {
      repairs.add(section === 'preamble' ? 'dropped leading text' : 'dropped stray lines');
    }
  }

  if (convertedText && raw.includes('\r')) repairs.add('converted CRLF line endings');
  const diffText = trimCompletelyEmptyOuterLines(out.join('\n'));
  return {
    diffText,
    changed: diffText !== trimCompletelyEmptyOuterLines(raw),
    repairs: [...repairs],
  };
}

/**
 * Makes sure the current file has both headers before its first hunk,
 * rebuilding them from the `diff --git` line when possible.
 */
function completeHeaders(block: FileBlock, out: string[], repairs: Set<string>): boolean {
  if (block.oldHeader && block.newHeader) return true;
  if (!block.gitPaths) return false;

  const [pathA, pathB] = block.gitPaths;
  if (!block.oldHeader) {
    block.oldHeader = block.newFile ? '--- /dev/null' : `--- a/${pathA}`;
    out.push(block.oldHeader);
  }
  if (!block.newHeader) {
    block.newHeader = block.deletedFile ? '+++ /dev/null' : `+++ b/${pathB}`;
    out.push(block.newHeader);
  }
  repairs.add('inserted missing file headers');
  return true;
}

function stripCr(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

function oldHeaderFor(block: FileBlock, newHeader: string): string {
  if (block.newFile) return '--- /dev/null';
  if (block.gitPaths) return `--- a/${block.gitPaths[0]}`;
  return newHeader.replace(/^\+\+\+ b\//, '--- a/');
}

function isHunkBodyLine(line: string): boolean {
  // An empty line inside a hunk is an empty context line.
  return line === '' || line[0] === ' ' || line[0] === '+' || line[0] === '-' || line[0] === '\\';
}

function isHeaderMetadataLine(line: string): boolean {
  return (
    line.startsWith('index ') ||
    line.startsWith('new file mode ') ||
    line.startsWith('deleted file mode ') ||
    line.startsWith('old mode ') ||
    line.startsWith('new mode ') ||
    line.startsWith('similarity index ') ||
    line.startsWith('dissimilarity index ') ||
    line.startsWith('rename from ') ||
    line.startsWith('rename to ') ||
    line.startsWith('copy from ') ||
    line.startsWith('copy to ')
  );
}

function repairDiffGitLine(line: string, repairs: Set<string>): string {
  if (DIFF_GIT_RE.test(line)) return line;
  const parts = line.slice('diff --git '.length).trim().split(/\s+/);
  if (parts.length !== 2) return line;
  const [left, right] = parts;
  repairs.add('added a/ b/ prefixes');
  return `diff --git ${withPrefix(left, 'a/')} ${withPrefix(right, 'b/')}`;
}

function prefixHeader(line: string, marker: string, prefix: string, repairs: Set<string>): string {
  const rest = line.slice(marker.length);
  // Drop a trailing timestamp ("\t2024-01-01 ...") that some diff tools add.
  const path = rest.split('\t')[0].trim();
  if (path === '/dev/null' || path.startsWith(prefix)) return line;
  repairs.add('added a/ b/ prefixes');
  return `${marker}${withPrefix(path, prefix)}`;
}

function withPrefix(path: string, prefix: string): string {
  if (path.startsWith(prefix)) return path;
  // The other side's prefix on this side ("--- b/x") is swapped rather than stacked.
  if (/^[ab]\//.test(path)) return prefix + path.slice(2);
  return prefix + path.replace(/^\.?\//, '');
}

/**
 * Removes completely empty leading/trailing lines and ends with a single newline.
 * Lines with spaces are kept; they can be diff context.
 */
export function trimCompletelyEmptyOuterLines(raw: string): string {
  const lines = raw.split('\n');
  const firstContentIdx = lines.findIndex((l) => l !== '');
  if (firstContentIdx === -1) return '';

  let lastContentIdx = -1;
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i] !== '') {
      lastContentIdx = i;
      break;
    }
  }

  return lines.slice(firstContentIdx, lastContentIdx + 1).join('\n') + '\n';
}

export interface DiffShape {
  /** Paths named in file headers, without their `a/` or `b/` prefix or /dev/null */
  paths: string[];
  hunks: number;
  /** Added plus removed lines */
  linesTouched: number;
}

/**
 * Walks a normalized diff the way `git apply` reads it: a hunk's line counts decide where its
 * body ends, so a removed line that looks like `--- path` is never taken for a header.
 * Lines past a miscounted hunk stay body lines until a header pair or `@@` turns up.
 */
export function summarizeDiff(diffText: string): DiffShape {
  const paths = new Set<string>();
  let hunks = 0;
  let linesTouched = 0;
  let inHunk = false;
  let oldLeft = 0;
  let newLeft = 0;

  const lines = diffText.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = stripCr(lines[i]);

    if (oldLeft > 0 || newLeft > 0) {
      const marker = line === '' ? ' ' : line[0];
      if (marker === '\\') continue;
      if (marker !== '+') oldLeft--;
      if (marker !== '-') newLeft--;
      if (marker === '+' || marker === '-') linesTouched++;
      continue;
    }

    const hunk = HUNK_HEADER_RE.exec(line);
    if (hunk) {
      hunks++;
      inHunk = true;
      oldLeft = Number(hunk[2] ?? '1');
      newLeft = Number(hunk[4] ?? '1');
      continue;
    }

    const headerPair = line.startsWith('--- ') && (lines[i + 1] ?? '').startsWith('+++ ');
    if (line.startsWith('diff --git ') || headerPair) inHunk = false;

    const header = inHunk ? null : /^(?:\+\+\+|---) (?:[ab]\/)?(.+)$/.exec(line);
    if (header) {
      const target = header[1].split('\t')[0].trim();
      if (target !== '/dev/null') paths.add(target);
    } else if (inHunk && (line.startsWith('+') || line.startsWith('-'))) {
      linesTouched++;
    }
  }

  return { paths: [...paths], hunks, linesTouched };
}
