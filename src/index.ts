import { LOG_PREFIX, createServer } from './server';

const { server } = createServer();

const PORT = Number(process.env.PORT || 5174);
server.listen(PORT, () => {
  console.log(`${LOG_PREFIX} listening on http://localhost:${PORT}`);
});
