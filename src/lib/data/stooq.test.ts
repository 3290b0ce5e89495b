import { describe, expect, it } from "vitest";

import { latestClose, parseStooqHistory } from "./stooq";

describe("parseStooqHistory", () => {
  it("parses the daily CSV and sorts it oldest first", () => {
    const csv = [
      "Date,Open,High,Low,Close,Volume",
      "2024-05-03,10,11,9,10.5,1000",
      "2024-05-01,9,10,8,9.5,1200",
      "2024-05-02,9.5,10.2,9.1,10,900",
      "",
    ].join("\r\n");

    expect(parseStooqHistory(csv)).toEqual([
      { date: "2024-05-01", close: 9.5 },
      { date: "2024-05-02", close: 10 },
      { date: "2024-05-03", close: 10.5 },
    ]);
  });

  it("skips rows without a numeric close", () => {
    const csv = "Date,Close\n2024-05-01,abc\n2024-05-02,12\n";
    expect(parseStooqHistory(csv)).toEqual([{ date: "2024-05-02", close: 12 }]);
  });

  it("skips rows whose date is not an ISO calendar date", () => {
    const csv = "Date,Close\n2024/05/01,11\n20240502,12\n2024-05-03T00:00,13\n2024-05-06,14\n";
    expect(parseStooqHistory(csv)).toEqual([{ date: "2024-05-06", close: 14 }]);
  });

  it("skips rows with an empty close", () => {
    const csv = "Date,Open,Close\n2024-05-01,1,\n2024-05-02,1,3\n";
    expect(parseStooqHistory(csv)).toEqual([{ date: "2024-05-02", close: 3 }]);
  });

  it("returns nothing for an error body", () => {
    expect(parseStooqHistory("No data")).toEqual([]);
    expect(parseStooqHistory("Symbol,Value\nX,1")).toEqual([]);
  });
});

describe("latestClose", () => {
  it("takes the last row", () => {
    expect(latestClose([{ date: "2024-05-01", close: 1 }, { date: "2024-05-02", close: 2 }])).toEqual({
      date: "2024-05-02",
      close: 2,
    });
    expect(latestClose([])).toBeNull();
  });
});
