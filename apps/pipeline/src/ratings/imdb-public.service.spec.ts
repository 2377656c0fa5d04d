import { BadGatewayException } from '@nestjs/common';
import { ImdbPublicService } from './imdb-public.service';

function page(ids: string[]): Response {
  const links = ids.map((id) => `<a href="/title/${id}/?ref_=rt">x</a>`).join('\n');
  return new Response(`<html><body>${links}</body></html>`, { status: 200 });
}

describe('ImdbPublicService', () => {
  const svc = new ImdbPublicService();

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('builds paginated ratings URLs', () => {
    const url = svc.buildRatingsPageUrl('ur1234567', 101);
    expect(url.toString()).toBe(
      'https://www.imdb.com/user/ur1234567/ratings?sort=ratings_date%2Cdesc&start=101',
    );
  });

  it('follows pages until one adds nothing new', async () => {
    const fetchMock = jest
      .spyOn(global, 'fetch')
      .mockResolvedValueOnce(page(['tt0000001', 'tt0000002']))
      .mockResolvedValueOnce(page(['tt0000003']))
      .mockResolvedValueOnce(page(['tt0000003']));

    const ids = await svc.loadUserRatingIds('ur1234567', 10);

    expect([...ids]).toEqual(['tt0000001', 'tt0000002', 'tt0000003']);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    const starts = fetchMock.mock.calls.map(([input]) =>
      input instanceof URL ? input.searchParams.get('start') : null,
    );
    expect(starts).toEqual(['1', '101', '201']);
  });

  it('stops at an empty page and at maxPages', async () => {
    jest
      .spyOn(global, 'fetch')
      .mockResolvedValueOnce(page(['tt0000001']))
      .mockResolvedValueOnce(page([]));
    expect((await svc.loadUserRatingIds('ur1', 10)).size).toBe(1);

    jest.restoreAllMocks();
    const capped = jest
      .spyOn(global, 'fetch')
      .mockResolvedValueOnce(page(['tt0000001']))
      .mockResolvedValueOnce(page(['tt0000002']));
    expect((await svc.loadUserRatingIds('ur1', 1)).size).toBe(1);
    expect(capped).toHaveBeenCalledTimes(1);
  });

  it('does nothing without a user id', async () => {
    const fetchMock = jest.spyOn(global, 'fetch');
    expect((await svc.loadUserRatingIds('  ', 10)).size).toBe(0);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('raises BadGatewayException on HTTP errors', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(new Response('', { status: 503 }));
    await expect(svc.loadUserRatingIds('ur1', 2)).rejects.toBeInstanceOf(
      BadGatewayException,
    );
  });
});
