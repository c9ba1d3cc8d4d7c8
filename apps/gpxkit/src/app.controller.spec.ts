import { AppController } from './app.controller';

describe('AppController', () => {
  it('reports health and the supported GPX versions', () => {
    expect(new AppController().health()).toEqual({
      status: 'ok',
      service: 'gpxkit',
      gpxVersions: ['1.0', '1.1'],
      timestamp: expect.any(String),
    });
  });
});
