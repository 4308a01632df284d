import { computeColumns, formatCell, serializeTable } from "../schemaWriter";

describe("schemaWriter", () => {
  describe("computeColumns", () => {
    it("should put the key first and sort the union of other fields", () => {
      const columns = computeColumns(
        [
          { activityId: "1", stressAvg: 20, activityName: "Run" },
          { distance: 5000, activityId: "2" },
        ],
        "activityId"
      );
      expect(columns).toEqual(["activityId", "activityName", "distance", "stressAvg"]);
    });

    it("should return only the key for an empty record set", () => {
      expect(computeColumns([], "date")).toEqual(["date"]);
    });
  });

  describe("formatCell", () => {
    it("should render missing values as empty cells", () => {
      expect(formatCell(undefined)).toBe("");
      expect(formatCell(null)).toBe("");
      expect(formatCell(NaN)).toBe("");
      expect(formatCell(Infinity)).toBe("");
    });

    it("should render numbers and booleans as text", () => {
      expect(formatCell(0)).toBe("0");
      expect(formatCell(7.25)).toBe("7.25");
      expect(formatCell(true)).toBe("true");
      expect(formatCell(false)).toBe("false");
    });

    it("should quote cells with separators, quotes or line breaks", () => {
      expect(formatCell("Run, easy")).toBe('"Run, easy"');
      expect(formatCell('The "long" one')).toBe('"The ""long"" one"');
      expect(formatCell("line\nbreak")).toBe('"line\nbreak"');
      expect(formatCell("plain")).toBe("plain");
    });
  });

  describe("serializeTable", () => {
    it("should write a header and one line per record with empty cells for gaps", () => {
      const text = serializeTable(
        [
          { date: "2024-03-01", sleepDuration: 7.5 },
          { date: "2024-03-02", stressAvg: 22 },
        ],
        "date"
      );

      expect(text).toBe(
        "date,sleepDuration,stressAvg\n2024-03-01,7.5,\n2024-03-02,,22\n"
      );
    });

    it("should write only the header when there are no records", () => {
      expect(serializeTable([], "activityId")).toBe("activityId\n");
    });
  });
});
