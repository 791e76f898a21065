/**
* Comment on a post; `author` is the commenting principal's ID.
*/
export interface Comment {
  id: string;
  postId: string;
  author: string;
  text: string;
}
