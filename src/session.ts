import type { InstrumentClient } from "./client.js";
import { errorMessage } from "./transport.js";

/**
 * Open a client, run one action on it and always close it again. Every
 * failure, including one raised while closing, is passed to `report` as
 * `Error: <message>`.
 *
 * @returns true when the action and the close both succeeded
 */
export async function runWithClient(
  connect: () => Promise<InstrumentClient>,
  action: (client: InstrumentClient) => Promise<void>,
  report: (message: string) => void = console.error
): Promise<boolean> {
  let ok = true;
  let client: InstrumentClient | undefined;
  try {
    client = await connect();
    await client.open();
    await action(client);
  } catch (err) {
    report(`Error: ${errorMessage(err)}`);
    ok = false;
  } finally {
    if (client) {
      try {
        await client.close();
      } catch (err) {
        report(`Error: ${errorMessage(err)}`);
        ok = false;
      }
    }
  }
  return ok;
}
