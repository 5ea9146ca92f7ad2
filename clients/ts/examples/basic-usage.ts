import {
  defineModel,
  MissingAttributeError,
  XapiandClient,
  XapiandError,
} from '../src';

const client = new XapiandClient({
  baseUrl: 'http://localhost:8880',
  // Optional: Add authentication if your server requires it
  // username: 'your-username',
  // password: 'your-password',
  timeout: 10000, // 10 seconds
});

const Article = defineModel({
  name: 'Article',
  indexTemplate: '/articles/{language}',
  schema: {
    title: { _type: 'text' },
    published: { _type: 'boolean', _default: false },
  },
  client,
});

async function basicUsageExample() {
  try {
    // The first write to a new index also provisions its schema
    console.log('Creating article...');
    const article = await Article.objects.create({ language: 'en', title: 'Hello' });
    console.log('Created:', article.toString());

    article.set('published', true);
    await article.save();
    console.log('Saved:', article.toString());

    const id = String(article.get('id'));
    const fresh = await Article.objects.get({ id, language: 'en', volatile: true });
    console.log('Fetched:', fresh.toString());

    const page = await Article.objects.filter({ language: 'en', query: 'title:hello', limit: 5 });
    console.log(`Found ${page.totalCount} of about ${page.matchesEstimated} articles`);
    for (const result of page.results) {
      console.log(' -', result.get('title'));
    }

    await fresh.delete();
    console.log('Deleted article', id);
  } catch (error) {
    if (error instanceof XapiandError) {
      console.error('API Error Response:', error.response);
      console.error('Status Code:', error.statusCode);
    } else if (error instanceof MissingAttributeError) {
      console.error('Missing field:', error.attribute);
    } else {
      console.error('Error occurred:', error);
    }
  }
}

// Run the example
basicUsageExample().catch(console.error);
