import { strict as assert } from "assert";
import { PassThrough } from "node:stream";
import { createPrompter } from "./prompter";

describe("createPrompter", () => {
  it("answers a whole game's worth of questions without piling up listeners", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const warnings: string[] = [];
    const onWarning = (warning: Error) => {
      warnings.push(warning.name);
    };
    process.on("warning", onWarning);

    const prompter = createPrompter(input, output);
    try {
      for (let i = 0; i < 40; i++) {
        const answer = prompter.ask("Black - Enter position (e.g. d3) or pass: ");
        input.write("d3\n");
        assert.equal(await answer, "d3");
      }
      // warnings are emitted on a later tick
      await new Promise((resolve) => setImmediate(resolve));
    } finally {
      prompter.close();
      process.off("warning", onWarning);
    }

    assert.deepEqual(warnings, []);
  });

  it("resolves a waiting question with an empty answer on close", async () => {
    const prompter = createPrompter(new PassThrough(), new PassThrough());
    const answer = prompter.ask("> ");
    prompter.close();

    assert.equal(await answer, "");
    assert.equal(prompter.closed, true);
    assert.equal(await prompter.ask("> "), "");
  });
});
