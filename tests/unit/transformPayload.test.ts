import { transformPayload } from "../../src/core/jobs/transformPayload";

const processedAt = new Date("2024-05-01T10:00:00.000Z");

describe("transformPayload", () => {
  it("counts words and characters of string payloads", () => {
    expect(transformPayload("hello world", processedAt)).toEqual({
      original_data: "hello world",
      processed_at: "2024-05-01T10:00:00.000Z",
      word_count: 2,
      char_count: 11,
      uppercase: "HELLO WORLD"
    });
  });

  it("ignores repeated and surrounding whitespace when counting words", () => {
    const result = transformPayload("  one\t two\n\nthree  ", processedAt);
    expect(result.word_count).toBe(3);
    expect(result.char_count).toBe(19);
  });

  it("reports zero words for an empty string", () => {
    const result = transformPayload("", processedAt);
    expect(result.word_count).toBe(0);
    expect(result.char_count).toBe(0);
    expect(result.uppercase).toBe("");
  });

  it("counts code points, not UTF-16 units", () => {
    const result = transformPayload("çay 🍵", processedAt);
    expect(result.char_count).toBe(5);
    expect(result.word_count).toBe(2);
    expect(result.uppercase).toBe("ÇAY 🍵");
  });

  it.each([
    { payload: 42 },
    { payload: null },
    { payload: true },
    { payload: { text: "hello" } },
    { payload: ["a", "b"] }
  ])("passes non-string payload $payload through with zero counts", ({ payload }) => {
    expect(transformPayload(payload, processedAt)).toEqual({
      original_data: payload,
      processed_at: "2024-05-01T10:00:00.000Z",
      word_count: 0,
      char_count: 0,
      uppercase: payload
    });
  });
});
