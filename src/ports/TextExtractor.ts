export interface TextExtractor {
  extractText: (filePath: string) => Promise<string>;
}
