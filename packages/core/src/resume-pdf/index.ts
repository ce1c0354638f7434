export { renderResumePdf, detectImageType, type RenderResumeOptions } from './render';
export { toWinAnsi, wrapText } from './text';
export * from './theme';
