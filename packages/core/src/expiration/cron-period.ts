const DAY_SECONDS = 86_400;

const FIELD_PART = /^(?:\*|(\d+)(?:-(\d+))?)(?:\/(\d+))?$/;

const expandField = (field: string, min: number, max: number): number[] | undefined => {
  const values = new Set<number>();
  for (const part of field.split(",")) {
    const match = FIELD_PART.exec(part);
    if (!match) {
      return undefined;
    }
    const [, first, last, stepText] = match;
    const step = stepText === undefined ? 1 : Number(stepText);
    const start = first === undefined ? min : Number(first);
    // "5/15" runs from 5 to the end of the range, like "5-59/15".
    const end = last !== undefined ? Number(last) : first === undefined || stepText !== undefined ? max : start;
    if (step < 1 || start < min || end > max || start > end) {
      return undefined;
    }
    for (let value = start; value <= end; value += step) {
      values.add(value);
    }
  }
  return [...values].sort((left, right) => left - right);
};

/**
 * Longest wait, in seconds, between two runs of a node-cron expression.
 * Only the second, minute and hour fields are measured; any day or month
 * field other than `*` counts as a gap of at least a day. Returns
 * `undefined` when those three fields use syntax it does not parse.
 */
export const longestCronGapSeconds = (expression: string): number | undefined => {
  const fields = expression.trim().split(/\s+/);
  if (fields.length === 5) {
    fields.unshift("0");
  }
  if (fields.length !== 6) {
    return undefined;
  }

  const seconds = expandField(fields[0] ?? "", 0, 59);
  const minutes = expandField(fields[1] ?? "", 0, 59);
  const hours = expandField(fields[2] ?? "", 0, 23);
  if (!seconds || !minutes || !hours) {
    return undefined;
  }

  const runs: number[] = [];
  for (const hour of hours) {
    for (const minute of minutes) {
      for (const second of seconds) {
        runs.push(hour * 3600 + minute * 60 + second);
      }
    }
  }

  const firstRun = runs[0] ?? 0;
  const lastRun = runs[runs.length - 1] ?? 0;
  let longest = firstRun + DAY_SECONDS - lastRun;
  for (let index = 1; index < runs.length; index += 1) {
    longest = Math.max(longest, (runs[index] ?? 0) - (runs[index - 1] ?? 0));
  }

  const everyDay = fields.slice(3).every((field) => field === "*");
  return everyDay ? longest : Math.max(longest, DAY_SECONDS);
};
