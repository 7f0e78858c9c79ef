export const MIN_PORT = 1;
export const MAX_PORT = 65535;

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= MIN_PORT && port <= MAX_PORT;
}

const DIGITS = /^\d+$/;

/**
 * Parse operator input such as `25565, 27015-27017 8080` into a sorted list of
 * unique ports. Reversed ranges are swapped; tokens that are not ports are
 * ignored.
 */
export function parsePortList(text: string): number[] {
  const ports = new Set<number>();

  for (const token of text.trim().split(/[\s,]+/)) {
    if (!token) continue;

    const dash = token.indexOf('-');
    if (dash >= 0) {
      const startText = token.slice(0, dash);
      const endText = token.slice(dash + 1);
      if (!DIGITS.test(startText) || !DIGITS.test(endText)) continue;

      let start = Number.parseInt(startText, 10);
      let end = Number.parseInt(endText, 10);
      if (start > end) {
        [start, end] = [end, start];
      }
      for (let port = Math.max(start, MIN_PORT); port <= Math.min(end, MAX_PORT); port++) {
        ports.add(port);
      }
      continue;
    }

    if (DIGITS.test(token)) {
      const port = Number.parseInt(token, 10);
      if (isValidPort(port)) {
        ports.add(port);
      }
    }
  }

  return sortPorts(ports);
}

export function sortPorts(ports: Iterable<number>): number[] {
  return Array.from(new Set(ports)).sort((a, b) => a - b);
}
