/**
 * PDF Reader Prompts
 *
 * @module server/prompts
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

/**
 * Prompt text asking the assistant to read and summarize a PDF.
 */
export function pdfReaderPrompt(filePath?: string): string {
  if (filePath) {
    return `I have a PDF file at "${filePath}" that I'd like to read and analyze.

Please use the read_pdf tool to extract and summarize the content of this document for me.
If the PDF is password-protected, I'll provide the password when asked.
`;
  }
  return `I'd like to read and analyze a PDF file.

I'll provide the file path, and then I'd like you to use the read_pdf tool to extract and summarize the document for me.
If the PDF is password-protected, I'll provide the password when asked.
`;
}

export function registerPrompts(server: McpServer): void {
  server.prompt(
    'pdf_reader_prompt',
    'Read and summarize a PDF file',
    { file_path: z.string().optional().describe('Path to the PDF file') },
    ({ file_path }) => ({
      messages: [{ role: 'user', content: { type: 'text', text: pdfReaderPrompt(file_path) } }],
    })
  );
}
