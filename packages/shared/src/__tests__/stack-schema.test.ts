import { describe, expect, it } from "vitest"
import { defaultStackDefinition, parseStackDefinition, toServiceDescriptors } from "../stack-schema.js"

const minimal = {
  domain: "example.com",
  serverIp: "203.0.113.10",
  services: {
    web: { subdomain: "app", port: 5000, build: "./web" },
  },
}

describe("parseStackDefinition", () => {
  it("should apply ssh and caddy defaults", () => {
    const definition = parseStackDefinition(JSON.stringify(minimal))
    expect(definition.ssh).toEqual({ user: "root", port: 22 })
    expect(definition.caddy).toEqual({})
  })

  it("should strip _comment keys at any depth", () => {
    const raw = JSON.stringify({
      _comment: "top-level note",
      ...minimal,
      services: { web: { _comment: "the app", subdomain: "app", port: 5000, build: "./web" } },
    })
    const definition = parseStackDefinition(raw)
    expect(definition.services.web).toEqual({ subdomain: "app", port: 5000, build: "./web" })
  })

  it("should reject malformed JSON with a readable message", () => {
    expect(() => parseStackDefinition("{not json")).toThrow(/^Invalid JSON in stack definition/)
  })

  it("should reject a service with both build and image", () => {
    const raw = JSON.stringify({
      ...minimal,
      services: { web: { port: 5000, build: "./web", image: "nginx:alpine" } },
    })
    expect(() => parseStackDefinition(raw)).toThrow(/exactly one of build or image/)
  })

  it("should reject a service with neither build nor image", () => {
    const raw = JSON.stringify({ ...minimal, services: { web: { port: 5000 } } })
    expect(() => parseStackDefinition(raw)).toThrow(/exactly one of build or image/)
  })

  it("should reject an internal service with a subdomain", () => {
    const raw = JSON.stringify({
      ...minimal,
      services: { db: { port: 5432, image: "postgres:15-alpine", internal: true, subdomain: "db" } },
    })
    expect(() => parseStackDefinition(raw)).toThrow(/Internal services cannot have a subdomain/)
  })

  it("should reserve the edge service name", () => {
    const raw = JSON.stringify({ ...minimal, services: { caddy: { port: 80, image: "caddy:2" } } })
    expect(() => parseStackDefinition(raw)).toThrow(/reserved for the edge proxy/)
  })

  it("should reject unknown keys", () => {
    const raw = JSON.stringify({ ...minimal, vpsIp: "203.0.113.10" })
    expect(() => parseStackDefinition(raw)).toThrow()
  })

  it("should reject an invalid server address", () => {
    const raw = JSON.stringify({ ...minimal, serverIp: "not-an-ip" })
    expect(() => parseStackDefinition(raw)).toThrow()
  })
})

describe("toServiceDescriptors", () => {
  it("should name descriptors after their keys, sorted by name", () => {
    const definition = parseStackDefinition(
      JSON.stringify({
        ...minimal,
        services: {
          web: { subdomain: "app", port: 5000, build: "./web" },
          cache: { port: 6379, image: "redis:7" },
        },
      }),
    )

    expect(toServiceDescriptors(definition)).toEqual([
      { name: "cache", port: 6379, image: "redis:7" },
      { name: "web", subdomain: "app", port: 5000, build: "./web" },
    ])
  })
})

describe("defaultStackDefinition", () => {
  it("should describe the starter topology", () => {
    const definition = defaultStackDefinition("example.com", "203.0.113.10")
    const services = toServiceDescriptors(definition)

    expect(services.map(s => s.name)).toEqual(["database", "static-site", "web-app"])
    expect(definition.caddy.email).toBe("admin@example.com")
    expect(definition.services["web-app"]?.aliases).toEqual(["api"])
    expect(definition.services.database?.internal).toBe(true)
    expect(definition.services["static-site"]?.default).toBe(true)
  })
})
