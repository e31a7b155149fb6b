import type { DeploymentTarget } from "../src/types.js"

export const target: DeploymentTarget = {
  domain: "example.com",
  address: "203.0.113.10",
  auth: { kind: "password", password: "test-secret" },
}
