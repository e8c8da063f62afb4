/**
 * Content types set on uploaded objects, in `mime` type-map form.
 * Extensions missing here are uploaded without a Content-Type.
 */
export const CONTENT_TYPES: Record<string, string[]> = {
  'text/html': ['html'],
  'text/css': ['css'],
  'application/javascript': ['js'],
  'application/json': ['json'],
  'image/png': ['png'],
  'image/jpeg': ['jpg', 'jpeg'],
  'image/gif': ['gif'],
  'image/svg+xml': ['svg'],
  'image/x-icon': ['ico'],
  'image/webp': ['webp'],
  'text/plain': ['txt'],
  'text/markdown': ['md'],
  'application/xml': ['xml'],
  'application/pdf': ['pdf'],
  'application/zip': ['zip'],
  'font/woff': ['woff'],
  'font/woff2': ['woff2'],
  'font/ttf': ['ttf'],
  'application/vnd.ms-fontobject': ['eot'],
};
