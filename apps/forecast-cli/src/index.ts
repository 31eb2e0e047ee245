#!/usr/bin/env node

import process from "node:process";
import { handleCliError, main } from "./cli";

main(process.argv.slice(2)).catch(handleCliError);
