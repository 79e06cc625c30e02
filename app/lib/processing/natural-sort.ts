/**
 * Natural ordering for page file names: digit runs compare by numeric value,
 * everything else by code unit, so "page2" sorts before "page10".
 */

const RUN_PATTERN = /(\d+)/;

function splitRuns(name: string): string[] {
  return name.split(RUN_PATTERN).filter((run) => run.length > 0);
}

function isDigitRun(run: string): boolean {
  const code = run.charCodeAt(0);
  return code >= 48 && code <= 57;
}

// Numeric runs may be longer than a safe integer, so compare as digit strings.
function compareNumericRuns(a: string, b: string): number {
  const left = a.replace(/^0+/, "");
  const right = b.replace(/^0+/, "");
  if (left.length !== right.length) return left.length < right.length ? -1 : 1;
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

function compareOrdinal(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function compareNatural(nameA: string, nameB: string): number {
  const runsA = splitRuns(nameA);
  const runsB = splitRuns(nameB);
  const shared = Math.min(runsA.length, runsB.length);

  for (let i = 0; i < shared; i++) {
    const a = runsA[i];
    const b = runsB[i];
    const order =
      isDigitRun(a) && isDigitRun(b) ? compareNumericRuns(a, b) : compareOrdinal(a, b);
    if (order !== 0) return order;
  }

  return runsA.length - runsB.length;
}

/**
 * Sort items by a name key without mutating the input.
 * Items whose names compare equal keep their original relative order.
 */
export function sortNatural<T>(items: readonly T[], key: (item: T) => string): T[] {
  return items
    .map((item, index) => ({ item, index, name: key(item) }))
    .sort((a, b) => compareNatural(a.name, b.name) || a.index - b.index)
    .map(({ item }) => item);
}
