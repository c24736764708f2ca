#!/usr/bin/env node
import { getSystemTimeZone } from "./index";

const timeZone = getSystemTimeZone();

if (timeZone) {
  console.log(timeZone);
} else {
  console.error("Error: Failed to get timezone");
  console.error(
    "You might want to report this error to the system-timezone maintainers, with your operating system and distribution"
  );
  process.exitCode = 1;
}
