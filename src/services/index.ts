export { listPlans } from './plans.js';
export { AuthService, hashPassword, USER_COLLECTION } from './auth-service.js';
export { BlogService, BLOG_COLLECTION, DEFAULT_LIST_LIMIT, toPublicDocument } from './blog-service.js';
export { ContactService, CONTACT_COLLECTION } from './contact-service.js';
export { runDiagnostics, MAX_REPORTED_COLLECTIONS, type DiagnosticSettings } from './diagnostics.js';
export { withStore } from './store-access.js';
