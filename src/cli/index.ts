#!/usr/bin/env node
import { Command } from "commander";
import { commands as scrapeCommands } from "./commands/scrape";
import { commands as imagesCommands } from "./commands/images";
import { commands as mergeCommands } from "./commands/merge";
import { commands as sessionsCommands } from "./commands/sessions";
import { commands as dbCommands } from "./commands/db";

const program = new Command();

program.name("pin-harvester").description("Resumable Pinterest keyword harvester and image downloader").version("0.1.0");

scrapeCommands(program);
imagesCommands(program);
mergeCommands(program);
sessionsCommands(program);
dbCommands(program);

program.parse();
