// Runs once when the server starts; missing credentials stop it before any request is served.
export async function register() {
  if (process.env.NEXT_RUNTIME !== 'nodejs') return;
  const { getConfig } = await import('@/lib/config');
  getConfig();
}
