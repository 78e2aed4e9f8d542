import type { Stores } from "./stores.js";
import { toISODate } from "./utils/dates.js";

/** What every router is built from. `now` is injectable so tests can pin the calendar day. */
export type AppContext = {
  stores: Stores;
  now: () => Date;
};

export function todayOf(ctx: AppContext): string {
  return toISODate(ctx.now());
}
