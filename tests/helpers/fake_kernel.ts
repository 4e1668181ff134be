import net from 'node:net';

export interface KernelExchange {
    auth: unknown;
    request: unknown;
}

/** What the fake replies with: an object (sent as one JSON line), a raw string, or nothing (close/hang). */
export type FakeReply = object | { raw: string } | { close: true } | { hang: true };

export type FakeHandler = (request: unknown, exchangeIndex: number) => FakeReply;

export interface FakeKernel {
    port: number;
    exchanges: KernelExchange[];
    close(): Promise<void>;
}

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * In-process line-JSON server on an ephemeral loopback port. Each connection
 * reads an auth frame then one request frame, replies once, and closes.
 */
export async function startFakeKernel(handler: FakeHandler): Promise<FakeKernel> {
    const exchanges: KernelExchange[] = [];
    const sockets = new Set<net.Socket>();

    const server = net.createServer((socket) => {
        sockets.add(socket);
        socket.on('close', () => sockets.delete(socket));
        socket.on('error', () => sockets.delete(socket));

        let buffered = '';
        const lines: unknown[] = [];
        socket.on('data', (chunk: Buffer) => {
            buffered += chunk.toString('utf-8');
            let nl = buffered.indexOf('\n');
            while (nl >= 0) {
                lines.push(JSON.parse(buffered.slice(0, nl)));
                buffered = buffered.slice(nl + 1);
                nl = buffered.indexOf('\n');
            }
            if (lines.length < 2) return;

            const exchange = { auth: lines[0], request: lines[1] };
            exchanges.push(exchange);
            lines.length = 0;

            const reply: unknown = handler(exchange.request, exchanges.length - 1);
            if (isRecord(reply) && reply.hang === true) return;
            if (isRecord(reply) && reply.close === true) {
                socket.end();
            } else if (isRecord(reply) && typeof reply.raw === 'string') {
                socket.end(reply.raw);
            } else {
                socket.end(JSON.stringify(reply) + '\n');
            }
        });
    });

    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('fake kernel has no port');

    return {
        port: address.port,
        exchanges,
        close: () =>
            new Promise<void>((resolve, reject) => {
                for (const s of sockets) s.destroy();
                server.close((err) => (err ? reject(err) : resolve()));
            }),
    };
}

/** A port nothing listens on: bind, read the port, release. */
export async function unusedPort(): Promise<number> {
    const server = net.createServer();
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    if (address === null || typeof address === 'string') throw new Error('no port');
    return address.port;
}
