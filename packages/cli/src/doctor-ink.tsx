import { render } from "ink";
import React from "react";
import type { CliContext } from "./context.js";
import { createDoctorMenu } from "./doctor-menu.js";
import { DoctorInkApp } from "./doctor-ink/app.js";

export async function runDoctorInk(context: CliContext): Promise<number> {
  const entries = createDoctorMenu(context);
  let exit: () => void = () => undefined;

  const app = render(<DoctorInkApp entries={entries} onExit={() => exit()} />, {
    patchConsole: false,
    exitOnCtrlC: false
  });
  exit = () => app.unmount();

  await app.waitUntilExit();
  return 0;
}
