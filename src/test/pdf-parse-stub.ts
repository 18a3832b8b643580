// In-process stand-in for pdf-parse: a "PDF" is any buffer starting with a
// %PDF header, whose remaining bytes are its text layer.
export class PDFParse {
  private readonly data: Uint8Array;

  constructor(options: { data: Uint8Array }) {
    this.data = options.data;
  }

  async getText(): Promise<{ text: string }> {
    const content = Buffer.from(this.data).toString('utf-8');
    if (!content.startsWith('%PDF-')) {
      throw new Error('Invalid PDF structure.');
    }
    if (content.includes('/Encrypt')) {
      throw new Error('No password given');
    }
    return { text: content.replace(/^%PDF-[\d.]+\n?/, '') };
  }

  async destroy(): Promise<void> {}
}
