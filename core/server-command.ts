import { resolve } from 'path'
import type { BinaryProvisioner } from './binary-provisioner'
import type { ServerCommand } from '../types'

/**
 * Spawn description for the provisioned MCP server. The server is configured
 * entirely through MCP messages on stdio, so it takes no arguments or env.
 */
export async function getServerCommand(
  provisioner: Pick<BinaryProvisioner, 'getOrProvision'>,
): Promise<ServerCommand> {
  const binaryPath = await provisioner.getOrProvision()
  return {
    command: resolve(binaryPath),
    args: [],
    env: {},
  }
}
