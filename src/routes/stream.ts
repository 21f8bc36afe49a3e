import { FastifyPluginAsync, FastifyRequest } from 'fastify';
import { SocketStream } from '@fastify/websocket';
import { StreamSession } from '../streaming/stream-session';
import { RouteOptions } from './rest';

type RawData = Buffer | ArrayBuffer | Buffer[];

const decode = (data: RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
};

/**
 * Streaming surface: one StreamSession per socket
 */
const streamRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { services }) => {
  fastify.get('/', { websocket: true }, (connection: SocketStream, request: FastifyRequest) => {
    const { socket } = connection;

    const session = new StreamSession(
      services,
      (frame) => {
        if (socket.readyState === socket.OPEN) {
          socket.send(JSON.stringify(frame));
        }
      },
      { headers: request.headers, ip: request.ip }
    );

    request.log.info('Stream connection opened');

    socket.on('message', (data: RawData) => {
      void session.handle(decode(data));
    });

    socket.on('close', () => {
      session.close();
      request.log.info('Stream connection closed');
    });

    socket.on('error', (err: Error) => {
      request.log.warn({ err }, 'Stream socket error');
      session.close();
    });
  });
};

export default streamRoutes;
