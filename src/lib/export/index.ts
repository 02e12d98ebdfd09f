export { PdfExporter, PdfSurface, MM_TO_PT, MM_PER_INCH, PT_PER_INCH, mmToPt, hexToRgbColor, encodableText } from './PdfSurface';
