import { vi } from "vitest"

// Node built-in ESM namespaces are frozen, so vi.spyOn cannot redefine their
// exports. Re-expose "os" as a plain object with the real implementations so
// tests can spy on it.
vi.mock("os", async (importOriginal) => ({ ...(await importOriginal<typeof import("os")>()) }))
