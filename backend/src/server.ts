import { WebSocketServer, WebSocket } from 'ws';
import { createApp } from './app';
import { CONFIG } from './config';
import { Database } from './database';
import { PeptideAnalyzer } from './pipeline/analyzer';
import { BioactivityScorer } from './pipeline/modules/bioactivity';
import { RemoteBioactivityOracle } from './pipeline/modules/bioactivity_remote';
import { UniProtResolver } from './services/uniprot';

const cache = new Database(CONFIG.PATHS.CACHE_DB);
const resolver = new UniProtResolver(cache);

// Heuristic-only unless a remote scorer is configured
if (CONFIG.BIOACTIVITY.API_URL) {
    console.log(`[Server] Remote bioactivity scorer: ${CONFIG.BIOACTIVITY.API_URL}`);
} else {
    console.log('[Server] No remote bioactivity scorer configured, heuristic scoring only');
}
const oracle = CONFIG.BIOACTIVITY.API_URL ? new RemoteBioactivityOracle() : null;

const analyzer = new PeptideAnalyzer({ resolver, scorer: new BioactivityScorer(oracle) });
const app = createApp(analyzer, resolver);

// --- Server Start ---

const server = app.listen(CONFIG.PORT, () => {
    console.log(`[Server] ${CONFIG.API_TITLE} running on http://localhost:${CONFIG.PORT}`);
});

// --- WebSocket ---

const wss = new WebSocketServer({ server });

wss.on('connection', (ws) => {
    console.log('[Server] Client connected');
    ws.send(JSON.stringify({ type: 'log', data: 'Connected to analysis stream' }));
});

// Broadcast helper
function broadcast(type: string, data: unknown) {
    const message = JSON.stringify({ type, data });
    wss.clients.forEach(client => {
        if (client.readyState === WebSocket.OPEN) {
            client.send(message);
        }
    });
}

// Hook into analyzer events
analyzer.on('log', (msg) => broadcast('log', msg));
analyzer.on('status', (msg) => broadcast('status', msg));
analyzer.on('progress', (progress) => broadcast('progress', progress));
