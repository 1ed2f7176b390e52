import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { LoaderError } from "../../../errors.js";
import { loadRecipientsFromCsv, parseRecipientCsvString } from "../../../recipients/csv-loader.js";
import { makeTempDir } from "../../helpers/fixtures.js";

describe("parseRecipientCsvString", () => {
  it("should read records with canonical headers", async () => {
    const records = await parseRecipientCsvString("name,company,email\nJane Doe,Acme,jane@acme.com\n");

    expect(records).toEqual([{ name: "Jane Doe", company: "Acme", email: "jane@acme.com" }]);
  });

  it("should map header aliases case-insensitively", async () => {
    const csv = "Recruiter Name,Company Name,Recruiter Email\nJohn Smith,Beta,john@beta.io\n";

    expect(await parseRecipientCsvString(csv)).toEqual([
      { name: "John Smith", company: "Beta", email: "john@beta.io" },
    ]);
  });

  it("should drop unknown columns", async () => {
    const csv = "Name,Phone,Company,Email\nJane Doe,555-0100,Acme,jane@acme.com\n";

    expect(await parseRecipientCsvString(csv)).toEqual([{ name: "Jane Doe", company: "Acme", email: "jane@acme.com" }]);
  });

  it("should reject a file missing the name and company columns", async () => {
    const error = await parseRecipientCsvString("Email\njane@acme.com\n", "people.csv").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LoaderError);
    expect(error).toMatchObject({
      message:
        "people.csv is missing required column(s): name (one of: name, recruiter_name, full_name); " +
        "company (one of: company, company_name, organization)",
    });
  });

  it("should keep blank cells in present columns for the dispatcher to default", async () => {
    const csv = "Name,Company,Email\n,,jane@acme.com\n";

    expect(await parseRecipientCsvString(csv)).toEqual([{ name: "", company: "", email: "jane@acme.com" }]);
  });

  it("should keep the first column that claims a field", async () => {
    const csv = "name,full_name,company,email\nJane Doe,J. D.,Acme,jane@acme.com\n";

    expect(await parseRecipientCsvString(csv)).toEqual([{ name: "Jane Doe", company: "Acme", email: "jane@acme.com" }]);
  });

  it("should handle quoted fields and CRLF line endings", async () => {
    const csv = 'name,company,email\r\n"Doe, Jane","Acme, Inc.",jane@acme.com\r\n';

    expect(await parseRecipientCsvString(csv)).toEqual([
      { name: "Doe, Jane", company: "Acme, Inc.", email: "jane@acme.com" },
    ]);
  });

  it("should keep rows with blank or malformed emails for the dispatcher to judge", async () => {
    const csv = "name,company,email\nNo Mail,Acme,\nBad Mail,Acme,not-an-email\n";

    expect(await parseRecipientCsvString(csv)).toEqual([
      { name: "No Mail", company: "Acme", email: "" },
      { name: "Bad Mail", company: "Acme", email: "not-an-email" },
    ]);
  });

  it("should reject a file without an email column", async () => {
    await expect(parseRecipientCsvString("name,company\nJane,Acme\n", "people.csv")).rejects.toThrow(
      "people.csv is missing required column(s): email (one of: email, recruiter_email, email_address)"
    );
  });

  it("should reject a header without records", async () => {
    await expect(parseRecipientCsvString("name,company,email\n")).rejects.toThrow(
      "CSV input contains no recipient records"
    );
  });
});

describe("loadRecipientsFromCsv", () => {
  let temp: Awaited<ReturnType<typeof makeTempDir>>;

  beforeEach(async () => {
    temp = await makeTempDir();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it("should load a file", async () => {
    const path = await temp.file("recruiters.csv", "Name,Email,Company\nJane Doe,jane@acme.com,Acme\n");

    expect(await loadRecipientsFromCsv(path)).toEqual([{ name: "Jane Doe", company: "Acme", email: "jane@acme.com" }]);
  });

  it("should reject a missing file", async () => {
    const path = join(temp.dir, "nope.csv");

    const error = await loadRecipientsFromCsv(path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LoaderError);
    expect(error).toMatchObject({ message: `CSV file not found: ${path}` });
  });

  it("should reject an empty file", async () => {
    const path = await temp.file("empty.csv", "");

    await expect(loadRecipientsFromCsv(path)).rejects.toThrow(`${path} is empty`);
  });
});
