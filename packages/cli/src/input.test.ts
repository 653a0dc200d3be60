import { Readable } from "node:stream";
import { CliError } from "./errors";
import { readSecret } from "./input";

function streamOf(...chunks: string[]): Readable {
  return Readable.from(chunks.map((chunk) => Buffer.from(chunk)));
}

describe("readSecret", () => {
  it("should return the first line trimmed", async () => {
    expect(await readSecret(streamOf("  JBSWY3DP \nsecond line\n"))).toBe("JBSWY3DP");
  });

  it("should strip Windows line endings", async () => {
    expect(await readSecret(streamOf("JBSWY3DP\r\n"))).toBe("JBSWY3DP");
  });

  it("should accept input without a trailing newline", async () => {
    expect(await readSecret(streamOf("JBSWY3DP"))).toBe("JBSWY3DP");
  });

  it("should join a line split across chunks", async () => {
    expect(await readSecret(streamOf("JBSW", "Y3DP\nrest"))).toBe("JBSWY3DP");
  });

  it("should return an empty string for empty input", async () => {
    expect(await readSecret(streamOf())).toBe("");
  });

  it("should fail with a CLI error when the stream errors", async () => {
    const broken = new Readable({
      read() {
        this.destroy(new Error("EIO"));
      },
    });

    const failure = readSecret(broken);
    await expect(failure).rejects.toBeInstanceOf(CliError);
    await expect(failure).rejects.toThrow("error reading stdin");
  });
});
