import type { Server } from "node:net";

/** Binds `server` and resolves with the port it got; port 0 picks a free one. */
export function listenOn(server: Server, host: string, port: number): Promise<number> {
	return new Promise((resolve, reject) => {
		server.once("error", reject);
		server.listen(port, host, () => {
			server.off("error", reject);
			const address = server.address();
			if (address === null || typeof address === "string") {
				reject(new Error("Expected a TCP address"));
				return;
			}
			resolve(address.port);
		});
	});
}
