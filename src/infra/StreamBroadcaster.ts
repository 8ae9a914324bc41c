import { Server as SocketIOServer } from 'socket.io';
import type { Server as HttpServer } from 'http';
import type { Gap, StreamKey } from '../domain/types';
import { isTimeframe } from '../domain/timeframes';
import type { DirectionalStats } from '../core/StatsAggregator';

export type GapEventName = 'gap:formed' | 'gap:updated';

export class StreamBroadcaster {
  private io: SocketIOServer;

  constructor(httpServer: HttpServer) {
    this.io = new SocketIOServer(httpServer, {
      cors: {
        origin: "*",
        methods: ["GET", "POST"]
      }
    });

    this.io.on('connection', (socket) => {
      console.log(`[Stream] Client connected: ${socket.id}`);

      // Timeframe rooms
      socket.on('subscribe', (tf: unknown) => {
        const tfs = Array.isArray(tf) ? tf : [tf];
        for (const t of tfs) {
          if (typeof t === 'string' && isTimeframe(t)) {
            socket.join(t);
            console.log(`[Stream] ${socket.id} subscribed to ${t}`);
          }
        }
      });

      socket.on('unsubscribe', (tf: unknown) => {
        const tfs = Array.isArray(tf) ? tf : [tf];
        for (const t of tfs) {
          if (typeof t === 'string') socket.leave(t);
        }
      });

      // Symbol rooms
      socket.on('subscribe:symbol', (symbol: unknown) => {
        if (typeof symbol === 'string') socket.join(`symbol:${symbol.toUpperCase()}`);
      });

      socket.on('unsubscribe:symbol', (symbol: unknown) => {
        if (typeof symbol === 'string') socket.leave(`symbol:${symbol.toUpperCase()}`);
      });
    });
  }

  /**
   * Sends a gap lifecycle event to its timeframe room and its symbol room
   */
  public broadcastGap(event: GapEventName, gap: Gap) {
    this.io.to(gap.timeframe).to(`symbol:${gap.instrument}`).emit(event, gap);
  }

  public broadcastStats(stream: StreamKey, stats: DirectionalStats) {
    this.io.to(stream.timeframe).to(`symbol:${stream.instrument}`).emit('stats', { ...stream, stats });
  }

  public shutdown() {
    this.io.close();
  }
}
