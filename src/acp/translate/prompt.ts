/**
 * Flatten ACP prompt content blocks into the linear text a turn responder sees.
 *
 * Blocks arrive straight off the wire, so nothing is assumed about their shape:
 * every field is read through the narrowing helpers below.
 */

type Block = Record<string, unknown>

function isBlock(x: unknown): x is Block {
  return typeof x === 'object' && x !== null && !Array.isArray(x)
}

function str(block: Block, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const v = block[key]
    if (typeof v === 'string' && v !== '') return v
  }
  return undefined
}

function renderResource(block: Block): string {
  const resource = isBlock(block.resource) ? block.resource : block
  const uri = str(resource, 'uri')
  const mimeType = str(resource, 'mimeType')
  const text = str(resource, 'text')

  if (!uri) return text ?? ''

  const header = mimeType ? `Resource (${mimeType}): ${uri}` : `Resource: ${uri}`
  return text ? `${header}\n\n${text}` : header
}

function renderResourceLink(block: Block): string {
  const name = str(block, 'name', 'title')
  const uri = str(block, 'uri', 'url')

  if (name && uri) return `Resource: ${name}\n${uri}`
  if (uri) return `Resource: ${uri}`
  if (name) return `Resource: ${name}`
  return ''
}

function renderMedia(block: Block, label: string): string {
  const uri = str(block, 'uri')
  return uri ? `[${label}: ${uri}]` : `[${label}]`
}

export function renderBlock(block: unknown): string {
  if (!isBlock(block)) return ''

  switch (block.type) {
    case 'text':
      return typeof block.text === 'string' ? block.text : ''

    case 'resource':
      return renderResource(block)

    case 'resource_link':
      return renderResourceLink(block)

    case 'image':
      return renderMedia(block, str(block, 'alt', 'title') ?? 'image')

    case 'audio':
      return renderMedia(block, str(block, 'title') ?? 'audio')

    default:
      return str(block, 'text', 'content') ?? ''
  }
}

/** Render every block, drop blank ones, join with a blank line. */
export function renderPrompt(blocks: readonly unknown[]): string {
  return blocks
    .map(renderBlock)
    .filter(text => text.trim() !== '')
    .join('\n\n')
    .trim()
}
