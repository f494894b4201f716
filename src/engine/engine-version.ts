/** Recorded in every manifest as `engineVersion`. Keep in step with package.json. */
export const ENGINE_VERSION = '0.1.0';
