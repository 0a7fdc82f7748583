#!/usr/bin/env tsx
/**
 * autodiff - evaluate, differentiate and sample expressions from the shell.
 *
 *   autodiff eval "x * x + 3" --at x=2          -> 7
 *   autodiff diff "exp(5 / x) - 5" --at x=2
 *   autodiff sample "sin(x)" --var x --from 0 --to 10 --count 101
 *
 * Built with Yargs + Zod, like the rest of the tooling.
 */

import { hideBin } from "yargs/helpers";
import { runCli } from "./program";

await runCli(hideBin(process.argv));
