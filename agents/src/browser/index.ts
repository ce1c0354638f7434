/**
 * Browser - fetching profile pages the student points us at.
 */

export * from './profile-page-scraper.js';
