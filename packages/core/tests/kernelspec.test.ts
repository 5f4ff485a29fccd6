import { describe, expect, it } from "vitest";

import {
    KERNELSPEC_DEFAULTS,
    defineKernelIdentity,
    developModeNotice,
    serializeKernelSpec,
    synthesizeKernelSpec,
} from "../src/index";

const identity = defineKernelIdentity({
    kernelName: "demo",
    displayName: "Demo Language",
    friendlyName: "Demo",
    languageName: "demo",
    kernelVersion: "1.2.3",
    description: "Demo kernel",
});

const CWD = "/home/dev/demo-kernel";

function countPlaceholders(argv: readonly string[]): number {
    return argv.filter((token) => token === KERNELSPEC_DEFAULTS.CONNECTION_FILE_PLACEHOLDER).length;
}

describe("synthesizeKernelSpec", () => {
    it("re-runs the develop script inside the working directory in develop mode", () => {
        const spec = synthesizeKernelSpec(identity, { mode: "develop", cwd: CWD });

        expect(spec.argv).toEqual([
            "npm", "run", "--silent", "--prefix", CWD, "start", "--",
            "kernel", "--log-level", "info", "{connection_file}",
        ]);
        expect(spec.displayName).toBe("demo");
        expect(spec.languageName).toBe("demo");
    });

    it("invokes the executable by name in installed mode", () => {
        const spec = synthesizeKernelSpec(identity, { mode: "installed", cwd: CWD });

        expect(spec.argv).toEqual(["demo", "kernel", "--log-level", "error", "{connection_file}"]);
        expect(spec.argv.some((token) => token.includes("/"))).toBe(false);
        expect(spec.displayName).toBe("Demo Language");
    });

    it("uses an explicit log level in either mode", () => {
        expect(synthesizeKernelSpec(identity, { mode: "develop", cwd: CWD, logLevel: "trace" }).argv).toContain("trace");
        expect(synthesizeKernelSpec(identity, { mode: "installed", cwd: CWD, logLevel: "debug" }).argv).toEqual([
            "demo", "kernel", "--log-level", "debug", "{connection_file}",
        ]);
    });

    it("ends every argv with exactly one connection file placeholder", () => {
        for (const mode of ["develop", "installed"] as const) {
            const { argv } = synthesizeKernelSpec(identity, { mode, cwd: CWD });
            expect(argv[argv.length - 1]).toBe("{connection_file}");
            expect(countPlaceholders(argv)).toBe(1);
        }
    });

    it("honours a custom executable and develop script", () => {
        const custom = defineKernelIdentity({
            kernelName: "demo",
            displayName: "Demo",
            friendlyName: "Demo",
            languageName: "demo",
            kernelVersion: "1.2.3",
            description: "",
            executable: "demo-kernel",
            developScript: "dev",
        });

        expect(synthesizeKernelSpec(custom, { mode: "installed", cwd: CWD }).argv[0]).toBe("demo-kernel");
        expect(synthesizeKernelSpec(custom, { mode: "develop", cwd: CWD }).argv[5]).toBe("dev");
    });
});

describe("serializeKernelSpec", () => {
    it("writes the host's kernel.json field names", () => {
        const spec = synthesizeKernelSpec(identity, { mode: "installed", cwd: CWD });

        expect(JSON.parse(serializeKernelSpec(spec))).toEqual({
            argv: ["demo", "kernel", "--log-level", "error", "{connection_file}"],
            display_name: "Demo Language",
            language: "demo",
        });
    });
});

describe("developModeNotice", () => {
    it("names the directory the registration depends on", () => {
        const lines = developModeNotice(identity, CWD).split("\n");

        expect(lines[0]).toBe(`NOTE: Installing a kernel spec which references ${CWD}.`);
        expect(lines[3]).toBe("      If this was not what you intended, run 'demo install' without the '--develop' option.");
    });
});
