// packages/unserial-runtime/keys.test.ts
import { expect, test } from "vitest";
import { stripVisibility, upperCaseFirstLetter } from "./keys.ts";

test("upperCaseFirstLetter - capitalizes only the first character", () => {
  expect(upperCaseFirstLetter("name")).toBe("Name");
  expect(upperCaseFirstLetter("firstName")).toBe("FirstName");
  expect(upperCaseFirstLetter("Age")).toBe("Age");
  expect(upperCaseFirstLetter("_id")).toBe("_id");
  expect(upperCaseFirstLetter("")).toBe("");
});

test("stripVisibility - private and protected prefixes", () => {
  expect(stripVisibility("\0Person\0name")).toBe("name");
  expect(stripVisibility("\0*\0age")).toBe("age");
  expect(stripVisibility("public")).toBe("public");
  expect(stripVisibility("\0broken")).toBe("\0broken");
});
