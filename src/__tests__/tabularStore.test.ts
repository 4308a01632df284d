import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { TabularStore, parseTable } from "../tabularStore";
import { StoreError } from "../shared/errors";
import { setLogLevel } from "../shared/logger";

describe("parseTable", () => {
  it("should handle quoted cells, doubled quotes, CRLF and blank lines", () => {
    const parsed = parseTable('a,b\n1,"x, y"\r\n2,"he said ""hi"""\n\n');

    expect(parsed.headers).toEqual(["a", "b"]);
    expect(parsed.rows).toEqual([
      ["1", "x, y"],
      ["2", 'he said "hi"'],
    ]);
  });

  it("should keep line breaks inside quoted cells", () => {
    expect(parseTable('note\n"line1\nline2"\n').rows).toEqual([["line1\nline2"]]);
  });

  it("should read a last line without a trailing newline", () => {
    expect(parseTable("date,steps\n2024-03-01,").rows).toEqual([["2024-03-01", ""]]);
  });

  it("should strip a byte order mark", () => {
    expect(parseTable("\uFEFFdate\n2024-03-01\n").headers).toEqual(["date"]);
  });

  it("should reject an unterminated quoted field", () => {
    expect(() => parseTable('date\n"2024')).toThrow("Unterminated quoted field");
  });
});

describe("TabularStore", () => {
  let tempDir: string;

  beforeAll(() => {
    setLogLevel("error");
  });

  afterAll(() => {
    setLogLevel("info");
  });

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "garmin-store-"));
  });

  afterEach(() => {
    if (fs.existsSync(tempDir)) {
      fs.rmSync(tempDir, { recursive: true });
    }
  });

  it("should load an empty list when the file does not exist", () => {
    const store = new TabularStore(path.join(tempDir, "missing.csv"), "date");
    expect(store.load()).toEqual([]);
  });

  it("should load an empty list from an empty file", () => {
    const filePath = path.join(tempDir, "empty.csv");
    fs.writeFileSync(filePath, "");
    expect(new TabularStore(filePath, "date").load()).toEqual([]);
  });

  it("should keep every column on every record after a round trip", () => {
    const filePath = path.join(tempDir, "garmin_stats.csv");
    const store = new TabularStore(filePath, "activityId");

    store.save([
      { activityId: "1", name: "Run, easy", distance: 5000 },
      { activityId: "2", hasPolyline: true },
    ]);

    expect(fs.readFileSync(filePath, "utf-8")).toBe(
      'activityId,distance,hasPolyline,name\n1,5000,,"Run, easy"\n2,,true,\n'
    );
    expect(store.load()).toEqual([
      { activityId: "1", distance: "5000", hasPolyline: "", name: "Run, easy" },
      { activityId: "2", distance: "", hasPolyline: "true", name: "" },
    ]);
  });

  it("should create missing directories and leave no temporary file", () => {
    const filePath = path.join(tempDir, "nested", "out", "daily.csv");
    new TabularStore(filePath, "date").save([{ date: "2024-03-01" }]);

    expect(fs.readFileSync(filePath, "utf-8")).toBe("date\n2024-03-01\n");
    expect(fs.existsSync(`${filePath}.tmp`)).toBe(false);
  });

  it("should refuse a store with more cells than columns", () => {
    const filePath = path.join(tempDir, "broken.csv");
    fs.writeFileSync(filePath, "date,sleepDuration\n2024-03-01,7,extra\n");

    const store = new TabularStore(filePath, "date");
    expect(() => store.load()).toThrow(StoreError);
    expect(() => store.load()).toThrow("row 2 has 3 cells but the header has 2");
  });

  it("should refuse a store without the key column", () => {
    const filePath = path.join(tempDir, "other.csv");
    fs.writeFileSync(filePath, "foo\n1\n");

    expect(() => new TabularStore(filePath, "date").load()).toThrow('missing key column "date"');
  });

  it("should report unreadable content as a store error", () => {
    const filePath = path.join(tempDir, "quoted.csv");
    fs.writeFileSync(filePath, 'date\n"2024');

    expect(() => new TabularStore(filePath, "date").load()).toThrow(
      "could not read store: Unterminated quoted field"
    );
  });
});
