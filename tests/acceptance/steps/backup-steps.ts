import { When } from "@cucumber/cucumber";
import { BackupWorld } from "../support/world.ts";

When("I back up {string} with note {string}", async function (this: BackupWorld, path: string, note: string) {
  await this.run([path, note]);
});

When("I back up {string} without a note", async function (this: BackupWorld, path: string) {
  await this.run([path]);
});

When(
  "I preview a backup of {string} with note {string}",
  async function (this: BackupWorld, path: string, note: string) {
    await this.run(["--dry-run", path, note]);
  },
);
