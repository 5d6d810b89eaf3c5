// examples/01-basic-decode/main.ts
// Focus: scalar decoding, projecting an object into a typed record, and errors as values.

import { readFileSync } from "node:fs";
import {
  decodeIntoSafe,
  f,
  formatDecodeError,
  type Infer,
  unserializeSafe,
} from "../../packages/unserial-runtime/mod.ts";

const Account$ = f.record({
  Id: f.int(),
  Username: f.text(),
  Balance: f.float(),
  Verified: f.bool(),
  Profile: f.record({
    City: f.text(),
    Theme: f.text().nullable(),
  }),
});

type Account = Infer<typeof Account$>;

function render(account: Account) {
  console.log(`#${account.Id} ${account.Username} (${account.Profile.City})`);
  console.log(`  balance=${account.Balance.toFixed(2)} verified=${account.Verified}`);
  console.log(`  theme=${account.Profile.Theme ?? "default"}`);
}

function demoScalars() {
  for (const wire of ["i:42;", "d:3.5;", "b:1;", "N;", 's:5:"hello";', "a:0:{}"]) {
    const result = unserializeSafe(wire);
    console.log(
      wire.padEnd(14),
      result.ok ? result.value : `error: ${formatDecodeError(result.error)}`,
    );
  }
}

function demoRecord() {
  const bytes = readFileSync(new URL("./data/account.txt", import.meta.url));
  const account = decodeIntoSafe(bytes, Account$);
  if (!account.ok) {
    console.error("Decoding failed unexpectedly", formatDecodeError(account.error));
    return;
  }
  // "locale" has no Profile field and is dropped
  render(account.value);
}

function demoMismatch() {
  const wire = 'O:7:"Account":1:{s:2:"id";s:4:"1042";}';
  const account = decodeIntoSafe(wire, Account$);
  console.log("\nMismatched payload:", account.ok ? account.value : formatDecodeError(account.error));
}

demoScalars();
demoRecord();
demoMismatch();
