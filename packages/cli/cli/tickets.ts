import { promises as fs } from 'node:fs';
import { resolve } from 'node:path';

/**
 * Read a support-ticket export. Entries are validated by the agent; this only
 * requires a JSON array, or an object with a `tickets` array.
 */
export const loadTicketsFile = async (filePath: string, workspacePath: string = process.cwd()): Promise<unknown[]> => {
  const absolute = resolve(workspacePath, filePath);
  const content = await fs.readFile(absolute, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(`Tickets file ${absolute} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (Array.isArray(parsed)) {
    return parsed;
  }
  if (typeof parsed === 'object' && parsed !== null && 'tickets' in parsed && Array.isArray(parsed.tickets)) {
    return parsed.tickets;
  }
  throw new Error(`Tickets file ${absolute} must contain an array of tickets`);
};
