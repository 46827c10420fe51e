import { Command, Option } from "clipanion";
import { detect, redact, validateSensitiveContext } from "../../privacy/redactor.js";

export class PiiScanCommand extends Command {
  static override paths = [["pii", "scan"]];

  static override usage = Command.Usage({
    description: "Show what redaction would replace in a piece of text",
    examples: [["Scan a sentence", 'kestrel pii scan "mail me at a@b.com"']],
  });

  text = Option.String({ name: "text", required: true });

  async execute(): Promise<void> {
    const matches = detect(this.text);
    if (matches.length === 0) {
      this.context.stdout.write("No PII detected.\n");
    } else {
      for (const match of matches) {
        this.context.stdout.write(
          `  ${match.type} [${match.startOffset}, ${match.endOffset}) -> ${match.replacementToken}\n`,
        );
      }
    }
    this.context.stdout.write(`Redacted: ${redact(this.text)}\n`);
    if (validateSensitiveContext(this.text)) {
      this.context.stdout.write("Warning: text contains a credential-like value.\n");
    }
  }
}
