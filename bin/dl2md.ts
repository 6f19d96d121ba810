#!/usr/bin/env -S npx tsx

// Render a commented Datalog file as literate Markdown on stdout, or a whole
// rules directory as a book of pages (`dl2md book rules book/src/rules`).

import { DocgenCLI } from "../lib/docgen/cli.ts";

process.exitCode = await new DocgenCLI().run(process.argv.slice(2));
