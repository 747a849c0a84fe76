/**
 * Test Fixtures
 * Reusable test documents
 */

/**
 * Five list items, each a heading wrapping a link
 */
export const listingHtml = `
<!DOCTYPE html>
<html>
<head>
  <title>Daily Links</title>
</head>
<body>
  <ul class="stories">
    <li class="item"><h3><a href="/post/1">Story number one</a></h3></li>
    <li class="item"><h3><a href="/post/2">Story number two</a></h3></li>
    <li class="item"><h3><a href="/post/3">Story number three</a></h3></li>
    <li class="item"><h3><a href="/post/4">Story number four</a></h3></li>
    <li class="item"><h3><a href="/post/5">Story number five</a></h3></li>
  </ul>
</body>
</html>
`;

/**
 * Blog index with rich metadata and item fields
 */
export const blogHtml = `
<!DOCTYPE html>
<html lang="en">
<head>
  <title>Example Blog</title>
  <meta name="description" content="Notes about gardening">
  <meta property="og:title" content="Example Blog Home">
  <meta property="og:type" content="website">
  <meta name="twitter:card" content="summary">
  <link rel="canonical" href="https://blog.example.com/">
</head>
<body>
  <main class="feed">
    <article class="entry">
      <h2 class="entry-title"><a href="/posts/tomatoes">Growing tomatoes indoors</a></h2>
      <span class="byline">by Ada</span>
      <time datetime="2024-03-01">March 1, 2024</time>
      <span class="points">42 points</span>
      <img class="thumb" src="/img/tomatoes.jpg" alt="">
    </article>
    <article class="entry">
      <h2 class="entry-title"><a href="/posts/basil">Keeping basil alive</a></h2>
      <span class="byline">by Grace</span>
      <time datetime="2024-03-02">March 2, 2024</time>
      <span class="points">17 points</span>
      <img class="thumb" src="/img/basil.jpg" alt="">
    </article>
    <article class="entry">
      <h2 class="entry-title"><a href="/posts/compost">Compost in small spaces</a></h2>
      <span class="byline">by Linus</span>
      <time datetime="2024-03-03">March 3, 2024</time>
      <span class="points">8 points</span>
      <img class="thumb" src="/img/compost.jpg" alt="">
    </article>
  </main>
  <nav class="pager"><a rel="next" href="/page/2">Next</a></nav>
</body>
</html>
`;
