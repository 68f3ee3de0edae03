// Runs once when the server starts; missing configuration stops it here.
export async function register() {
    if (process.env.NEXT_RUNTIME === 'nodejs') {
        const { getConfig } = await import('./lib/config');
        const { owner, repo, branch, path } = getConfig();
        console.log(`[Daily Log] Using ${owner}/${repo}@${branch}:${path}`);
    }
}
