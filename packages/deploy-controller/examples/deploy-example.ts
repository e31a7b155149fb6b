/**
 * Example: Deploy the starter stack to a host
 *
 * Usage: tsx examples/deploy-example.ts <domain> <server-ip> [ssh-key-path]
 */

import { loadEnvFile } from "@stackship/env/server"
import { formatDeployEvent } from "@stackship/deploy-events"
import { defaultStackDefinition, toServiceDescriptors } from "@stackship/shared"
import { DeploymentCoordinator } from "../src/index.js"

const [domain, serverIp, keyPath = "~/.ssh/id_ed25519"] = process.argv.slice(2)

if (!domain || !serverIp) {
  console.error("Usage: tsx examples/deploy-example.ts <domain> <server-ip> [ssh-key-path]")
  process.exit(1)
}

async function main() {
  loadEnvFile()

  const definition = defaultStackDefinition(domain, serverIp)
  const coordinator = DeploymentCoordinator.fromEnv({
    confirm: plan => {
      console.log(`Deploying ${plan.services.join(", ")} to ${plan.target.address}:${plan.remoteDir}`)
      return true
    },
  })

  coordinator.subscribe(event => {
    console.log(formatDeployEvent(event))
  })

  const run = await coordinator.deploy({
    target: {
      domain,
      address: serverIp,
      user: definition.ssh.user,
      port: definition.ssh.port,
      auth: { kind: "privateKey", path: keyPath },
      acmeEmail: definition.caddy.email,
    },
    services: toServiceDescriptors(definition),
    localRoot: process.cwd(),
  })

  if (run.status === "completed") {
    console.log("\n✅ Deployment successful!")
    for (const url of run.verification?.urls ?? []) {
      console.log(`   ${url}`)
    }
  } else {
    console.error(`\n❌ Deployment ${run.status} at phase ${run.phase ?? "-"}`)
    console.error(`   Error: ${run.error instanceof Error ? run.error.message : String(run.error)}`)
    process.exit(1)
  }
}

main().catch(error => {
  console.error("\n💥 Unexpected error:", error)
  process.exit(1)
})
