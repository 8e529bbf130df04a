import { describe, it, expect } from "vitest";
import { Readable, Writable } from "stream";
import { ReadlinePrompter } from "../../src/intake/IntakePrompter";

function collector(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

describe("ReadlinePrompter", () => {
  it("returns one line per question and null at end of input", async () => {
    const output = collector();
    const prompter = new ReadlinePrompter(Readable.from(["lead\nsave\n"]), output.stream);

    expect(await prompter.ask("Name: ")).toBe("lead");
    expect(await prompter.ask("Name: ")).toBe("save");
    expect(await prompter.ask("Name: ")).toBeNull();
    prompter.close();

    expect(output.text()).toBe("Name: Name: Name: ");
  });

  it("prints whole lines", () => {
    const output = collector();
    const prompter = new ReadlinePrompter(Readable.from([]), output.stream);

    prompter.print("Saved");
    prompter.close();

    expect(output.text()).toBe("Saved\n");
  });
});
