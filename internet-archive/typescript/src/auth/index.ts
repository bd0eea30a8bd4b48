export { Credentials, SecretString, ACCESS_KEY_ENV, SECRET_KEY_ENV } from './credentials.js';
