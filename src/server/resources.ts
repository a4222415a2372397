/**
 * PDF Resources
 *
 * Exposes PDFs as Markdown documents through the `pdf://` URI scheme:
 *
 *   pdf:///abs/path/file.pdf              unprotected PDF
 *   pdf:///abs/path/file.pdf/PASSWORD     protected PDF
 *
 * Both forms share one `{+file_path}` template. When the full path is not a
 * file but its parent is, the last segment is taken as the password.
 * Resources always render inline page text, whatever the read_pdf response mode.
 *
 * @module server/resources
 */

import path from 'path';
import { ResourceTemplate, type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { InlineExtraction } from '../services/extraction/orchestrator.js';
import { getConfig, getOrchestrator } from './state.js';
import { sanitizePath } from '../utils/validation.js';
import { isFile } from '../utils/files.js';
import { describeError } from '../services/pdf/errors.js';

export const PDF_RESOURCE_TEMPLATE = 'pdf://{+file_path}';

interface PdfResourceTarget {
  filePath: string;
  password?: string;
}

function decodePathVariable(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch (error) {
    console.error(`[resources] Keeping undecoded path "${raw}": ${describeError(error)}`);
    return raw.replace(/%20/g, ' ');
  }
}

/**
 * Split a resource path into the document path and an optional trailing password.
 */
export function resolveResourceTarget(rawPath: string): PdfResourceTarget {
  const filePath = decodePathVariable(rawPath);
  if (isFile(filePath)) {
    return { filePath };
  }
  const parent = path.dirname(filePath);
  if (parent !== filePath && isFile(parent)) {
    return { filePath: parent, password: path.basename(filePath) };
  }
  return { filePath };
}

/**
 * Render a successful extraction as Markdown.
 */
export function renderPdfMarkdown(filePath: string, result: InlineExtraction): string {
  let output = `# PDF Content: ${path.basename(filePath)}\n\n`;

  const metadataEntries = Object.entries(result.metadata);
  if (metadataEntries.length > 0) {
    output += '## Metadata\n\n';
    for (const [key, value] of metadataEntries) {
      output += `- **${key}**: ${typeof value === 'string' ? value : JSON.stringify(value)}\n`;
    }
    output += '\n';
  }

  output += `## Content (${result.total_pages} pages total)\n\n`;
  for (const pageNumber of result.extracted_pages) {
    output += `### Page ${pageNumber}\n\n`;
    output += `${result.content[pageNumber] ?? ''}\n\n`;
  }
  return output;
}

/**
 * Read a `pdf://` resource path and render it as Markdown.
 */
export async function readPdfResource(rawPath: string): Promise<string> {
  const target = resolveResourceTarget(rawPath);
  let filePath: string;
  try {
    filePath = sanitizePath(target.filePath, getConfig().allowedDirectories);
  } catch (error) {
    return `# Error Reading PDF\n\n${describeError(error)}`;
  }

  const result = await getOrchestrator('inline').extract({
    filePath,
    password: target.password,
  });

  if (!result.success) {
    if (result.password_required && target.password === undefined) {
      return (
        '# Password Required\n\n' +
        'This PDF is protected with a password. Please use the PDF resource with a password ' +
        `parameter: \`pdf://${filePath}/YOUR_PASSWORD\``
      );
    }
    return `# Error Reading PDF\n\n${result.error}`;
  }
  if (result.response_mode !== 'inline') {
    return `# Error Reading PDF\n\nUnexpected ${result.response_mode} result for resource read`;
  }
  return renderPdfMarkdown(filePath, result);
}

/**
 * Register the pdf:// resource template on the server.
 */
export function registerResources(server: McpServer): void {
  server.resource(
    'pdf',
    new ResourceTemplate(PDF_RESOURCE_TEMPLATE, { list: undefined }),
    {
      description: 'PDF document rendered as Markdown; append /PASSWORD for protected files',
      mimeType: 'text/markdown',
    },
    async (uri, variables) => {
      const raw = variables.file_path;
      const rawPath = Array.isArray(raw) ? raw.join('/') : raw;
      const text = await readPdfResource(rawPath ?? '');
      return { contents: [{ uri: uri.href, mimeType: 'text/markdown', text }] };
    }
  );
}
