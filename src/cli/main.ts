#!/usr/bin/env node
import { buildProgram } from './program.js';
import { ClackPrompter, clackReporter } from '../prompts/prompter.js';

const program = buildProgram({
  prompter: new ClackPrompter(),
  reporter: clackReporter,
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  exit: (code) => {
    process.exitCode = code;
  },
});

await program.parseAsync(process.argv);
