import { describe, it, expect } from "vitest";
import { writeSseEvent } from "../src/routes/factCheck";

describe("writeSseEvent", () => {
  it("writes an event line, a data line and a blank line", () => {
    const chunks: string[] = [];
    writeSseEvent({ write: (chunk: string) => chunks.push(chunk) }, {
      type: "SearchQueryGenerated",
      data: { claim_id: "0.0", claim_text: "Paris is the capital of France.", query: "capital of France" }
    });

    expect(chunks).toEqual([
      'event: SearchQueryGenerated\ndata: {"claim_id":"0.0","claim_text":"Paris is the capital of France.","query":"capital of France"}\n\n'
    ]);
  });

  it("keeps newlines inside the JSON payload escaped", () => {
    const chunks: string[] = [];
    writeSseEvent({ write: (chunk: string) => chunks.push(chunk) }, {
      type: "Error",
      data: { message: "line one\nline two", scope: "run" }
    });

    expect(chunks[0]).toBe('event: Error\ndata: {"message":"line one\\nline two","scope":"run"}\n\n');
  });
});
