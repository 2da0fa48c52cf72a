import { z } from 'zod'

const Flag = z.boolean().catch(false)

const FileSystemSchema = z
  .object({ readTextFile: Flag, writeTextFile: Flag })
  .catch({ readTextFile: false, writeTextFile: false })

const ClientCapabilitiesSchema = z
  .object({ fs: FileSystemSchema, terminal: Flag })
  .catch({ fs: { readTextFile: false, writeTextFile: false }, terminal: false })

/**
 * Client capabilities as negotiated at `initialize`. Normalized once: anything that
 * is not literally `true` in the client's document counts as unsupported.
 */
export type NegotiatedCapabilities = Readonly<z.infer<typeof ClientCapabilitiesSchema>>

export type Capability = 'fs.readTextFile' | 'fs.writeTextFile' | 'terminal'

export const NO_CAPABILITIES: NegotiatedCapabilities = Object.freeze({
  fs: { readTextFile: false, writeTextFile: false },
  terminal: false
})

export function normalizeClientCapabilities(raw: unknown): NegotiatedCapabilities {
  return Object.freeze(ClientCapabilitiesSchema.parse(raw ?? {}))
}

export function hasCapability(caps: NegotiatedCapabilities, capability: Capability): boolean {
  switch (capability) {
    case 'fs.readTextFile':
      return caps.fs.readTextFile
    case 'fs.writeTextFile':
      return caps.fs.writeTextFile
    case 'terminal':
      return caps.terminal
  }
}

/** Capability guarding a client method, or null for baseline methods. */
export function capabilityForMethod(method: string): Capability | null {
  if (method === 'fs/read_text_file') return 'fs.readTextFile'
  if (method === 'fs/write_text_file') return 'fs.writeTextFile'
  if (method.startsWith('terminal/')) return 'terminal'
  return null
}
