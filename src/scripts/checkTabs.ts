import { readOptions } from "../config/options";
import { createStore } from "../config/sheets";
import { TABS } from "../models/types";

const check = async () => {
  const options = readOptions();
  const store = createStore(options);
  console.log(`Checking spreadsheet ${options.google_sheet_id}`);

  for (const tab of Object.values(TABS)) {
    const rows = await store.readTab(tab);
    const header = rows[0] ?? [];
    console.log(
      `${tab}: ${Math.max(rows.length - 1, 0)} row(s), columns: ${header.join(", ") || "(none)"}`,
    );
  }
};

check()
  .then(() => process.exit(0))
  .catch((e: unknown) => {
    console.error(e);
    process.exit(1);
  });
