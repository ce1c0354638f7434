/**
 * @careernav/core - document rendering shared by the web app and scripts
 */

export * from './resume-pdf/index';
