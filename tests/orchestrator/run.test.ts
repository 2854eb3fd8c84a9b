// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, HashSet, Option } from "effect";
import { describe, expect, test } from "vitest";
import { type OneOffOptions, defaultOneOffOptions, oneOffArgs, oneOffRecord } from "../../src/orchestrator/run";
import { containerRecord, edge, projectOf } from "../helpers/fixtures";
import { runTest } from "../helpers/layers";

const web = containerRecord("web", {
  deps: HashSet.make(edge("db")),
  definition: {
    image: "web:latest",
    ports: ["8080:80"],
    restart: "always",
    environment: { A: "1" },
    command: ["serve"],
  },
});
const project = projectOf([containerRecord("db"), web]);

const options = (overrides: Partial<OneOffOptions> = {}): OneOffOptions => ({
  ...defaultOneOffOptions,
  service: "web",
  name: Option.some("job"),
  ...overrides,
});

describe("oneOffRecord", () => {
  test("command, environment and removal adjust a copy of the service", async () => {
    const record = await Effect.runPromise(
      oneOffRecord(project, options({ command: ["sh"], env: ["B=2", "A=3"], rm: true, noDeps: true }))
    );
    expect(record.name).toBe("job");
    expect(record.definition).toEqual({
      image: "web:latest",
      command: ["sh"],
      environment: { A: "3", B: "2" },
      tty: true,
    });
    expect(HashSet.size(record.deps)).toBe(0);
    expect(project.containers[1]?.definition["restart"]).toBe("always");
  });

  test("service ports are kept on request and extended by --publish", async () => {
    const record = await Effect.runPromise(
      oneOffRecord(project, options({ servicePorts: true, publish: ["9000:9000"], noTty: true }))
    );
    expect(record.definition["ports"]).toEqual(["8080:80", "9000:9000"]);
    expect(record.definition["restart"]).toBe("always");
    expect(record.definition["tty"]).toBe(false);
    expect(HashSet.size(record.deps)).toBe(1);
  });

  test("the default name carries the project and service", async () => {
    const record = await Effect.runPromise(oneOffRecord(project, options({ name: Option.none() })));
    expect(record.name).toMatch(/^demo_web_tmp\d+$/);
  });

  test("unknown service", async () => {
    const error = await Effect.runPromise(Effect.flip(oneOffRecord(project, options({ service: "cache" }))));
    expect(error._tag).toBe("GeneralError");
  });
});

describe("oneOffArgs", () => {
  test("--rm and -i follow the name", async () => {
    const args = await runTest(
      Effect.gen(function* () {
        const opts = options({ rm: true, noDeps: true, command: ["sh"] });
        const record = yield* oneOffRecord(project, opts);
        return yield* oneOffArgs(project, record, opts);
      })
    );
    expect(args.slice(0, 3)).toEqual(["--name=job", "--rm", "-i"]);
    expect(args.slice(-2)).toEqual(["web:latest", "sh"]);
  });

  test("detached runs are not interactive", async () => {
    const args = await runTest(
      Effect.gen(function* () {
        const opts = options({ detach: true, noDeps: true });
        const record = yield* oneOffRecord(project, opts);
        return yield* oneOffArgs(project, record, opts);
      })
    );
    expect(args.slice(0, 2)).toEqual(["--name=job", "-d"]);
    expect(args).not.toContain("-i");
  });
});
