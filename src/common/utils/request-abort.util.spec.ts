import { EventEmitter } from 'events';
import { abortOnClientDisconnect } from './request-abort.util';

class FakeResponse extends EventEmitter {
  writableEnded = false;
  destroyed = false;
  req = { socket: { destroyed: false } };
}

describe('abortOnClientDisconnect', () => {
  it('aborts when the connection closes before the response is written', () => {
    const res = new FakeResponse();
    const signal = abortOnClientDisconnect(res);

    expect(signal.aborted).toBe(false);
    res.emit('close');

    expect(signal.aborted).toBe(true);
  });

  it('does not abort after a completed response', () => {
    const res = new FakeResponse();
    const signal = abortOnClientDisconnect(res);

    res.writableEnded = true;
    res.emit('close');

    expect(signal.aborted).toBe(false);
  });

  it('aborts immediately when the socket is already gone', () => {
    const res = new FakeResponse();
    res.req.socket.destroyed = true;

    expect(abortOnClientDisconnect(res).aborted).toBe(true);
  });

  it('aborts immediately when the response is already destroyed', () => {
    const res = new FakeResponse();
    res.destroyed = true;

    expect(abortOnClientDisconnect(res).aborted).toBe(true);
  });
});
