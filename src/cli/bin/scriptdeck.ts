// src/cli/bin/scriptdeck.ts
// CLI bootstrap (executes the parser).
import { makeCli } from '..';

void makeCli().parseAsync();
