import assert from "node:assert/strict";
import { join } from "node:path";
import { test } from "node:test";
import { traceConfig } from "../../src/config.ts";
import { CliError } from "../../src/errors.ts";
import { createWorkspace, writeFixture } from "../support/workspace.ts";

test("traceConfig lists every field from defaults, sorted by name", async () => {
  const cwd = await createWorkspace();

  const values = await traceConfig({ cwd, env: { HOME: cwd } });

  assert.deepEqual(values, [
    { name: "backup_dir_path", value: "../.bkpfile", source: "default" },
    { name: "config", value: "./.bkpfile.yml:~/.bkpfile.yml", source: "default" },
    { name: "status_config_error", value: "10", source: "default" },
    { name: "status_created_backup", value: "0", source: "default" },
    { name: "status_disk_full", value: "30", source: "default" },
    { name: "status_failed_to_create_backup_directory", value: "31", source: "default" },
    { name: "status_file_is_identical_to_existing_backup", value: "0", source: "default" },
    { name: "status_file_not_found", value: "20", source: "default" },
    { name: "status_invalid_file_type", value: "21", source: "default" },
    { name: "status_permission_denied", value: "22", source: "default" },
    { name: "use_current_dir_name", value: "true", source: "default" },
  ]);
});

test("traceConfig takes each field from the first file that mentions it", async () => {
  const cwd = await createWorkspace();
  await writeFixture(cwd, "a.yml", "backup_dir_path: /x\n");
  await writeFixture(cwd, "b.yml", "backup_dir_path: /y\nuse_current_dir_name: false\n");

  const values = await traceConfig({ cwd, env: { HOME: cwd, BKPFILE_CONFIG: "a.yml:b.yml" } });
  const byName = new Map(values.map((entry) => [entry.name, entry]));

  assert.deepEqual(byName.get("backup_dir_path"), { name: "backup_dir_path", value: "/x", source: "./a.yml" });
  assert.deepEqual(byName.get("use_current_dir_name"), {
    name: "use_current_dir_name",
    value: "false",
    source: "./b.yml",
  });
  assert.equal(byName.get("status_disk_full")?.source, "default");
});

test("traceConfig attributes the config key to the file that sets it", async () => {
  const cwd = await createWorkspace();
  await writeFixture(cwd, "primary.yml", 'backup_dir_path: "/tmp/primary"\n');
  await writeFixture(
    cwd,
    "secondary.yml",
    'backup_dir_path: "/tmp/secondary"\nuse_current_dir_name: false\nconfig: "alternate.yml"\n',
  );

  const values = await traceConfig({ cwd, env: { BKPFILE_CONFIG: "primary.yml:secondary.yml" } });
  const lines = values.map((entry) => `${entry.name}: ${entry.value} (source: ${entry.source})`);

  assert.equal(lines[0], "backup_dir_path: /tmp/primary (source: ./primary.yml)");
  assert.equal(lines[1], "config: alternate.yml (source: ./secondary.yml)");
  assert.equal(lines[10], "use_current_dir_name: false (source: ./secondary.yml)");
});

test("traceConfig keeps ./ and absolute sources as given", async () => {
  const cwd = await createWorkspace();
  const absolute = await writeFixture(cwd, "abs.yml", "status_disk_full: 40\n");
  await writeFixture(cwd, "dot.yml", "status_file_not_found: 41\n");

  const values = await traceConfig({ cwd, env: { BKPFILE_CONFIG: `./dot.yml:${absolute}` } });
  const byName = new Map(values.map((entry) => [entry.name, entry]));

  assert.equal(byName.get("status_file_not_found")?.source, "./dot.yml");
  assert.equal(byName.get("status_disk_full")?.source, join(cwd, "abs.yml"));
  assert.equal(byName.get("status_disk_full")?.value, "40");
});

test("traceConfig shows the home-expanded backup path", async () => {
  const cwd = await createWorkspace();
  await writeFixture(cwd, "home.yml", 'backup_dir_path: "~/backups"\n');

  const values = await traceConfig({ cwd, env: { HOME: "/home/test", BKPFILE_CONFIG: "home.yml" } });

  assert.deepEqual(values[0], { name: "backup_dir_path", value: "/home/test/backups", source: "./home.yml" });
});

test("traceConfig fails as a whole on a malformed file", async () => {
  const cwd = await createWorkspace();
  await writeFixture(cwd, "good.yml", "backup_dir_path: /ok\n");
  await writeFixture(cwd, "bad.yml", "status_disk_full: [\n");

  await assert.rejects(
    traceConfig({ cwd, env: { BKPFILE_CONFIG: "good.yml:bad.yml" } }),
    (error: unknown) => error instanceof CliError && error.code === "ERR_CONFIG_PARSE",
  );
});
